export type AccountId = string;

export function normaliseAccountId(provided: string): AccountId | null {
  const trimmed = provided.trim();
  return trimmed.length > 0 ? trimmed : null;
}
