import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@code-verdict/config';
import { PatternSecurityScanner, loadSecurityRules, type SecurityRule } from '../src/security.js';

const CODE = `import os
import pickle


def run(command):
    os.system(command)  # eval(command) in a comment
    data = pickle.loads(command)
    note = "eval(x) inside a string"
    return eval(data)
`;

describe('PatternSecurityScanner', () => {
  const scanner = new PatternSecurityScanner();

  it('should report dangerous calls with their location', async () => {
    const findings = await scanner.scan(CODE);

    expect(findings).toEqual([
      {
        ruleId: 'shell-command',
        severity: 'HIGH',
        location: { line: 6, column: 5 },
        message: 'Shell command execution',
      },
      {
        ruleId: 'pickle-load',
        severity: 'HIGH',
        location: { line: 7, column: 12 },
        message: 'Deserialization of untrusted data with pickle',
      },
      {
        ruleId: 'eval-call',
        severity: 'HIGH',
        location: { line: 9, column: 12 },
        message: 'Dynamic evaluation with eval()',
      },
    ]);
  });

  it('should flag user input flowing into exec as critical', async () => {
    const findings = await scanner.scan('cmd = input("> ")\nexec(cmd)\n');

    expect(findings.map((f) => `${f.ruleId}/${f.severity}@${f.location.line}:${f.location.column}`)).toEqual([
      'exec-call/HIGH@2:1',
      'input-code-injection/CRITICAL@2:1',
    ]);
  });

  it('should not flag methods that share a dangerous name', async () => {
    expect(await scanner.scan('model.eval()\nrunner.exec(job)\n')).toEqual([]);
  });

  it('should flag unsafe yaml loading and literal credentials', async () => {
    const findings = await scanner.scan('config = yaml.load(handle)\npassword = "test-secret"\n');

    expect(findings.map((f) => `${f.ruleId}/${f.severity}@${f.location.line}:${f.location.column}`)).toEqual([
      'yaml-load/MEDIUM@1:10',
      'hardcoded-password/LOW@2:1',
    ]);
  });

  it('should return nothing for clean code', async () => {
    expect(await scanner.scan('def add(a, b):\n    return a + b\n')).toEqual([]);
  });

  it('should still scan source that does not parse', async () => {
    const findings = await scanner.scan('import os\ncmd = input()\nos.system(cmd)\neval(cmd\n');

    expect(findings.map((f) => `${f.ruleId}/${f.severity}@${f.location.line}:${f.location.column}`)).toEqual([
      'shell-command/HIGH@3:1',
      'eval-call/HIGH@4:1',
      'input-code-injection/CRITICAL@4:1',
    ]);
  });

  describe('custom rules', () => {
    const rule: SecurityRule = {
      id: 'debug-print',
      pattern: '\\bprint\\s*\\(',
      severity: 'LOW',
      message: 'Debug output',
    };

    it('should apply the supplied rules only', async () => {
      const custom = new PatternSecurityScanner([rule]);

      expect(custom.getRuleIds()).toEqual(['debug-print']);
      expect((await custom.scan('print(1); eval(x)\n')).map((f) => f.ruleId)).toEqual(['debug-print']);
    });

    it('should reject duplicate rule IDs', () => {
      expect(() => new PatternSecurityScanner([rule, rule])).toThrow(ConfigurationError);
    });

    it('should reject an invalid pattern', () => {
      expect(() => new PatternSecurityScanner([{ ...rule, pattern: '(' }])).toThrow(
        /^Security rule debug-print has an invalid pattern/,
      );
    });
  });
});

describe('loadSecurityRules', () => {
  it('should load the bundled rule set', () => {
    const rules = loadSecurityRules();

    expect(rules).toHaveLength(9);
    expect(rules.find((r) => r.id === 'input-code-injection')?.severity).toBe('CRITICAL');
  });
});
