export const Priority = {
  Low: 'low',
  Medium: 'medium',
  High: 'high',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PriorityName: Record<Priority, string> = {
  [Priority.Low]: 'Low',
  [Priority.Medium]: 'Medium',
  [Priority.High]: 'High',
};

export const PRIORITIES: readonly Priority[] = [Priority.Low, Priority.Medium, Priority.High];
