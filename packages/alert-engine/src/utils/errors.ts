import type { ZodIssue } from 'zod';

export type EngineErrorCode = 'INVALID_ZONE' | 'MALFORMED_POI' | 'CONFIGURATION_ERROR';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A zone that cannot take part in containment queries. The zone is skipped,
 * the rest of the load goes ahead.
 */
export class InvalidZoneError extends EngineError {
  readonly zoneId: string;

  constructor(zoneId: string, reason: string) {
    super('INVALID_ZONE', `Zone ${zoneId} skipped: ${reason}`);
    this.zoneId = zoneId;
  }
}

export class MalformedPOIError extends EngineError {
  readonly poiId?: string;

  constructor(reason: string, poiId?: string) {
    super('MALFORMED_POI', poiId ? `POI ${poiId} dropped: ${reason}` : `POI dropped: ${reason}`);
    this.poiId = poiId;
  }
}

export class ConfigurationError extends EngineError {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super('CONFIGURATION_ERROR', message);
    this.issues = issues;
  }
}

export type DiagnosticsCallback = (error: EngineError) => void;

export const describeIssues = (issues: ZodIssue[]): string =>
  issues.map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
