import { z } from 'zod';
import { SeverityEnum, type SecurityChecker, type SecurityFinding } from '@code-verdict/verdict-core';
import { ConfigurationError } from '@code-verdict/config';
import { readDataFile } from './data.js';
import { createPythonParser, maskedLines } from './parser.js';

export const securityRuleSchema = z.object({
  id: z.string().min(1),
  /** Matched against each line with string contents blanked */
  pattern: z.string().min(1),
  /** The rule only applies when this also matches somewhere in the source */
  requires: z.string().min(1).optional(),
  severity: SeverityEnum,
  message: z.string(),
});
export type SecurityRule = z.infer<typeof securityRuleSchema>;

const securityRulesFileSchema = z.object({
  rules: z.array(securityRuleSchema),
});

interface CompiledRule {
  rule: SecurityRule;
  pattern: RegExp;
  requires: RegExp | null;
}

function compile(rule: SecurityRule): CompiledRule {
  try {
    return {
      rule,
      pattern: new RegExp(rule.pattern, 'g'),
      requires: rule.requires === undefined ? null : new RegExp(rule.requires),
    };
  } catch (error) {
    throw new ConfigurationError(
      `Security rule ${rule.id} has an invalid pattern: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/**
 * Load the bundled rule set from data/security-patterns.json
 */
export function loadSecurityRules(): SecurityRule[] {
  const result = securityRulesFileSchema.safeParse(readDataFile('security-patterns.json'));
  if (!result.success) {
    const issues = result.error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigurationError(`Security rules validation failed:\n${issues}`);
  }
  return result.data.rules;
}

function compareFindings(a: SecurityFinding, b: SecurityFinding): number {
  return (
    a.location.line - b.location.line ||
    (a.location.column ?? 0) - (b.location.column ?? 0) ||
    a.ruleId.localeCompare(b.ruleId)
  );
}

/**
 * Line-oriented pattern scanner for dangerous calls.
 *
 * Comments and string contents are blanked before matching, so a call
 * mentioned in a docstring is not reported. Source with syntax errors is
 * still scanned: the dangerous call is often what fails to parse.
 */
export class PatternSecurityScanner implements SecurityChecker {
  private readonly rules: CompiledRule[];
  private readonly parser = createPythonParser();

  constructor(rules: SecurityRule[] = loadSecurityRules()) {
    const ids = new Set<string>();
    for (const rule of rules) {
      if (ids.has(rule.id)) {
        throw new ConfigurationError(`Duplicate security rule ID: ${rule.id}`);
      }
      ids.add(rule.id);
    }
    this.rules = rules.map(compile);
  }

  getRuleIds(): string[] {
    return this.rules.map((r) => r.rule.id);
  }

  async scan(code: string, signal?: AbortSignal): Promise<SecurityFinding[]> {
    signal?.throwIfAborted();

    const physical = maskedLines(this.parser.parse(code), code);
    const blanked = physical.join('\n');
    const findings: SecurityFinding[] = [];

    for (const { rule, pattern, requires } of this.rules) {
      if (requires !== null && !requires.test(blanked)) continue;

      physical.forEach((text, index) => {
        for (const match of text.matchAll(pattern)) {
          findings.push({
            ruleId: rule.id,
            severity: rule.severity,
            location: { line: index + 1, column: (match.index ?? 0) + 1 },
            message: rule.message,
          });
        }
      });
    }

    return findings.sort(compareFindings);
  }
}
