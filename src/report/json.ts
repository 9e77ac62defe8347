import { CheckResult } from "../core/types";
import { describePattern, regExpText } from "../rules/pattern";
import { formatViolation } from "../rules/rule";

export function renderJson(result: CheckResult): string {
  const payload = {
    ...result,
    rules: result.rules.map(({ rule, violations }) => ({
      name: rule.name,
      packages: regExpText(rule.packageSelector),
      mayDepend: rule.allowedDependencyPatterns.map((pattern) => describePattern(pattern)),
      violations: violations.map((violation) => ({ ...violation, text: formatViolation(violation) }))
    }))
  };

  return `${JSON.stringify(payload, null, 2)}\n`;
}
