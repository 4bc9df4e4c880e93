export const Priority = {
  Low: 'low',
  Medium: 'medium',
  High: 'high',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PRIORITIES: readonly [Priority, ...Priority[]] = [Priority.Low, Priority.Medium, Priority.High];

export const DEFAULT_PRIORITY: Priority = Priority.Medium;

export const PriorityName: Record<Priority, string> = {
  [Priority.Low]: 'Low',
  [Priority.Medium]: 'Medium',
  [Priority.High]: 'High',
};

/** Narrow an untrusted value to a Priority. Exact lowercase match only, no coercion. */
export function parsePriority(value: string): Priority | null {
  for (const p of PRIORITIES) {
    if (p === value) return p;
  }
  return null;
}
