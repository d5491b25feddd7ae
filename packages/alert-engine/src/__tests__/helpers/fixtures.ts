import { HeatPointType, PointOfInterest, RestrictedZone, ZoneType } from '@wayguard/shared-types';

export const RED_FORT_ZONE: RestrictedZone = {
  id: 'red-fort',
  name: 'Red Fort Danger Zone',
  zoneType: ZoneType.DANGEROUS,
  polygon: [
    { latitude: 28.60, longitude: 77.20 },
    { latitude: 28.60, longitude: 77.22 },
    { latitude: 28.64, longitude: 77.22 },
    { latitude: 28.64, longitude: 77.20 }
  ],
  warningMessage: 'Avoid the area after dark'
};

// About 110m x 98m around (28.70, 77.30)
export const SMALL_ZONE: RestrictedZone = {
  id: 'market-lane',
  name: 'Market Lane',
  zoneType: ZoneType.RESTRICTED,
  polygon: [
    { latitude: 28.6995, longitude: 77.2995 },
    { latitude: 28.6995, longitude: 77.3005 },
    { latitude: 28.7005, longitude: 77.3005 },
    { latitude: 28.7005, longitude: 77.2995 }
  ]
};

export const INSIDE_RED_FORT = { latitude: 28.62, longitude: 77.21 };
export const OUTSIDE_RED_FORT = { latitude: 28.70, longitude: 77.30 };

export const makePOI = (overrides: Partial<PointOfInterest> = {}): PointOfInterest => ({
  id: 'poi-1',
  position: { latitude: 28.6139, longitude: 77.2090 },
  type: HeatPointType.PANIC_ALERT,
  intensity: 0.9,
  timestamp: new Date('2026-03-01T10:00:00Z'),
  alertCount: 1,
  ...overrides
});

export class ManualClock {
  private current: number;

  constructor(start = '2026-03-01T12:00:00Z') {
    this.current = new Date(start).getTime();
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): Date {
    this.current += ms;
    return this.now();
  }
}
