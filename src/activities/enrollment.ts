// --- Enrollment Engine: guarded signup / unregister transitions ---
// Every call is synchronous, so lookup -> guard -> mutate runs to completion
// before any other request is handled.

import type { ActivityCatalog } from './catalog.js';
import type { ActivitySnapshot, EnrollmentFailure, EnrollmentFailureKind, EnrollmentResult } from './types.js';

export const MESSAGES = {
  notFound: 'Activity not found',
  alreadySignedUp: 'Student is already signed up',
  notRegistered: 'Student is not registered for this activity',
} as const;

function fail(kind: EnrollmentFailureKind, message: string): EnrollmentFailure {
  return { ok: false, kind, message };
}

export class EnrollmentEngine {
  constructor(private readonly catalog: ActivityCatalog) {}

  listActivities(): ReadonlyMap<string, ActivitySnapshot> {
    return this.catalog.list();
  }

  /**
   * Add `studentId` to the activity's participants. Not idempotent: a second
   * identical call fails with `conflict`. Capacity is advisory and not checked.
   */
  signup(activityName: string, studentId: string): EnrollmentResult {
    const activity = this.catalog.get(activityName);
    if (!activity) {
      console.warn(`[Enrollment] Signup rejected: unknown activity "${activityName}"`);
      return fail('not_found', MESSAGES.notFound);
    }
    if (activity.participants.has(studentId)) {
      console.warn(`[Enrollment] Signup rejected: ${studentId} already in ${activityName}`);
      return fail('conflict', MESSAGES.alreadySignedUp);
    }

    activity.participants.add(studentId);
    console.log(`[Enrollment] ${studentId} joined ${activityName} (${activity.participants.size}/${activity.maxParticipants})`);
    return {
      ok: true,
      activity: activityName,
      studentId,
      message: `Signed up ${studentId} for ${activityName}`,
    };
  }

  unregister(activityName: string, studentId: string): EnrollmentResult {
    const activity = this.catalog.get(activityName);
    if (!activity) {
      console.warn(`[Enrollment] Unregister rejected: unknown activity "${activityName}"`);
      return fail('not_found', MESSAGES.notFound);
    }
    if (!activity.participants.has(studentId)) {
      console.warn(`[Enrollment] Unregister rejected: ${studentId} not in ${activityName}`);
      return fail('conflict', MESSAGES.notRegistered);
    }

    activity.participants.delete(studentId);
    console.log(`[Enrollment] ${studentId} left ${activityName} (${activity.participants.size}/${activity.maxParticipants})`);
    return {
      ok: true,
      activity: activityName,
      studentId,
      message: `Removed ${studentId} from ${activityName}`,
    };
  }
}
