/**
 * Returns whether a setting value reads as "yes": one of '1', 'on', 'true' or 'yes', in any case.
 */
export function isAffirmative(parameter: unknown): boolean {
  return ['1', 'on', 'true', 'yes'].includes(String(parameter).toLowerCase());
}
