export enum ZoneType {
  DANGEROUS = 'dangerous',
  HIGH_RISK = 'high_risk',
  RESTRICTED = 'restricted',
  CAUTION = 'caution',
  SAFE = 'safe'
}

export enum HeatPointType {
  PANIC_ALERT = 'panic_alert',
  RESTRICTED_ZONE = 'restricted_zone',
  SAFETY_INCIDENT = 'safety_incident',
  GENERAL = 'general'
}

export enum ProximityAlertType {
  PANIC_ALERT = 'panic_alert',
  RESTRICTED_ZONE = 'restricted_zone'
}

export enum AlertSeverity {
  CRITICAL = 'critical',
  HIGH = 'high',
  MODERATE = 'moderate'
}

export enum GeofenceEventType {
  ENTER = 'enter',
  EXIT = 'exit'
}

export enum RiskLevel {
  SAFE = 'safe',
  MODERATE = 'moderate',
  RISKY = 'risky',
  DANGEROUS = 'dangerous'
}

// Highest first
export const ZONE_SEVERITY_ORDER: readonly ZoneType[] = [
  ZoneType.DANGEROUS,
  ZoneType.HIGH_RISK,
  ZoneType.RESTRICTED,
  ZoneType.CAUTION,
  ZoneType.SAFE
];
