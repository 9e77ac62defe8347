import { CheckResult } from "../core/types";

export const EXIT_OK = 0;
export const EXIT_VIOLATIONS = 1;
export const EXIT_FAILURE = 2;

export function determineExitCode(result: Pick<CheckResult, "rules">): number {
  return result.rules.some((entry) => entry.violations.length > 0) ? EXIT_VIOLATIONS : EXIT_OK;
}
