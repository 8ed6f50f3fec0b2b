export function devAssert(
  condition: unknown,
  message: string,
): asserts condition {
  const booleanCondition = Boolean(condition);
  if (!booleanCondition) {
    throw new Error(message);
  }
}
