export const Priority = {
  Low: 0,
  Medium: 1,
  High: 2,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export type PriorityLabel = 'LOW' | 'MEDIUM' | 'HIGH';

/** Priority assumed for any ordinal outside 0..2 (e.g. a hand-edited store file) */
export const FALLBACK_PRIORITY: Priority = Priority.Medium;

export function priorityToOrdinal(priority: Priority): number {
  return priority;
}

/**
 * Map a stored ordinal back to a Priority.
 * Unknown ordinals coerce to {@link FALLBACK_PRIORITY} instead of failing.
 */
export function priorityFromOrdinal(ordinal: number): Priority {
  switch (ordinal) {
    case Priority.Low: return Priority.Low;
    case Priority.Medium: return Priority.Medium;
    case Priority.High: return Priority.High;
    default: return FALLBACK_PRIORITY;
  }
}

/** Upper-case label for display; unknown ordinals read as MEDIUM */
export function priorityLabel(ordinal: number): PriorityLabel {
  switch (ordinal) {
    case Priority.Low: return 'LOW';
    case Priority.Medium: return 'MEDIUM';
    case Priority.High: return 'HIGH';
    default: return 'MEDIUM';
  }
}

/** Parse "low" / "medium" / "high" or "0" / "1" / "2". Null when unrecognised. */
export function parsePriorityName(level: string): Priority | null {
  switch (level.trim().toLowerCase()) {
    case 'low': case '0': return Priority.Low;
    case 'medium': case '1': return Priority.Medium;
    case 'high': case '2': return Priority.High;
    default: return null;
  }
}
