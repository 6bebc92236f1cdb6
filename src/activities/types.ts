// --- Activity Catalog: record, snapshot and outcome types ---

export interface ActivitySeed {
  name: string;
  description: string;
  schedule: string;
  maxParticipants: number;
  participants: string[];
}

/** Live catalog entry. Only the participant set ever changes. */
export interface ActivityRecord {
  readonly name: string;
  readonly description: string;
  readonly schedule: string;
  readonly maxParticipants: number;
  readonly participants: Set<string>;
}

export interface ActivitySnapshot {
  name: string;
  description: string;
  schedule: string;
  maxParticipants: number;
  participants: string[];
}

export type EnrollmentFailureKind = 'not_found' | 'conflict';

export interface EnrollmentSuccess {
  ok: true;
  activity: string;
  studentId: string;
  message: string;
}

export interface EnrollmentFailure {
  ok: false;
  kind: EnrollmentFailureKind;
  message: string;
}

export type EnrollmentResult = EnrollmentSuccess | EnrollmentFailure;

export class CatalogConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogConfigError';
  }
}
