/**
 * Per-member holiday-week and patching-week counters for a single scheduling run.
 * Counters start at zero for every roster member and only ever go up.
 */
export type FairnessTracker = {
  holidayCounts: Map<string, number>;
  patchingCounts: Map<string, number>;
};

export function createFairnessTracker(roster: readonly string[]): FairnessTracker {
  const holidayCounts = new Map<string, number>();
  const patchingCounts = new Map<string, number>();
  for (const member of roster) {
    holidayCounts.set(member, 0);
    patchingCounts.set(member, 0);
  }
  return { holidayCounts, patchingCounts };
}

export function getHolidayCount(tracker: FairnessTracker, member: string): number {
  return tracker.holidayCounts.get(member) ?? 0;
}

export function getPatchingCount(tracker: FairnessTracker, member: string): number {
  return tracker.patchingCounts.get(member) ?? 0;
}

// Floor across the whole roster, not just members available this week
export function getMinPatchingCount(tracker: FairnessTracker): number {
  let min = Infinity;
  for (const count of tracker.patchingCounts.values()) {
    if (count < min) min = count;
  }
  return min === Infinity ? 0 : min;
}

export function recordAssignment(
  tracker: FairnessTracker,
  member: string,
  hasHoliday: boolean,
  hasPatching: boolean
): void {
  if (hasHoliday) {
    tracker.holidayCounts.set(member, getHolidayCount(tracker, member) + 1);
  }
  if (hasPatching) {
    tracker.patchingCounts.set(member, getPatchingCount(tracker, member) + 1);
  }
}
