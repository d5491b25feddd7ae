import jwt from 'jsonwebtoken';

export const TEST_SECRET = 'test-secret';

export const tokenFor = (subjectId: string, secret = TEST_SECRET): string =>
  jwt.sign({ subjectId, role: 'tourist' }, secret, { expiresIn: '1h' });

// Square around (28.62, 77.21), in the upstream payload shape
export const FORT_ZONE_PAYLOAD = {
  id: 'red-fort',
  name: 'Red Fort Danger Zone',
  type: 'dangerous',
  polygon_coordinates: [[28.60, 77.20], [28.60, 77.22], [28.64, 77.22], [28.64, 77.20]],
  warning_message: 'Avoid the area after dark'
};

export const PANIC_ALERT_PAYLOAD = {
  id: 'alert-1',
  latitude: 28.6139,
  longitude: 77.2090,
  severity: 'critical',
  tourist_id: 'tourist-2'
};

export const INSIDE_FORT = { latitude: 28.62, longitude: 77.21 };
export const OUTSIDE_FORT = { latitude: 28.70, longitude: 77.30 };
export const NEAR_ALERT = { latitude: 28.6150, longitude: 77.2090 };
