import { readFileSync } from 'node:fs';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import { ProvisionError, ErrorCode } from '../lib/errors.js';
import { planSchema, type Plan } from './types.js';

// ── Variable expansion ──

const VARIABLE_PATTERN = /\$\{\{\s*env\.\s*([a-zA-Z_]\w*)\s*\}\}/g;

/** Replace `${{ env.NAME }}` with the variable's value; unknown names stay intact */
export function expandVariables(
  text: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return text.replace(VARIABLE_PATTERN, (match, name: string) => env[name] ?? match);
}

// ── Pre-validation (catch structural errors before Zod) ──

function preValidate(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return '✗ plan file must contain a YAML object\n  Example:\n    name: my-server\n    steps:\n      - kind: shell\n        name: update-packages\n        run: ["apt-get update"]';
  }

  if ('phases' in raw && !('steps' in raw)) {
    return '✗ plan uses "phases"; provisioning plans list their work under "steps"';
  }

  if ('name' in raw && typeof raw.name === 'number') {
    return '✗ plan.name must be a string, not a number\n  Example: name: "web-server"';
  }

  return null;
}

// ── Error formatting ──

export function formatPlanError(error: ZodError): string {
  const lines: string[] = [];

  for (const issue of error.issues) {
    const path = issue.path.join('.');

    // Friendly messages for common mistakes
    if (path === 'steps' && issue.code === 'too_small') {
      lines.push('✗ plan.steps must have at least one step');
      lines.push('  Example:\n    steps:\n      - kind: shell\n        name: update-packages\n        run: ["apt-get update"]');
      continue;
    }

    if (path === 'name' && issue.code === 'invalid_string') {
      lines.push('✗ plan.name must be kebab-case');
      lines.push('  Example: web-server, ubuntu-base, build-agent');
      continue;
    }

    if (issue.code === 'invalid_union_discriminator') {
      lines.push(`✗ ${path}: ${issue.message}`);
      continue;
    }

    if (issue.code === 'custom') {
      // Business rule errors from superRefine
      lines.push(path ? `✗ ${path}: ${issue.message}` : `✗ ${issue.message}`);
      continue;
    }

    // Generic format
    lines.push(`✗ ${path}: ${issue.message}`);
  }

  return lines.join('\n');
}

// ── Business rule validation (superRefine) ──

const planWithRules = planSchema.superRefine((plan, ctx) => {
  // Unique step names
  const seen = new Set<string>();
  plan.steps.forEach((step, i) => {
    if (seen.has(step.name)) {
      ctx.addIssue({
        code: 'custom',
        path: ['steps', i, 'name'],
        message: `duplicate step name: "${step.name}"`,
      });
    }
    seen.add(step.name);
  });
});

// ── Public API ──

/** Parse a YAML string into a validated Plan. Throws ProvisionError on failure. */
export function parsePlanYaml(content: string, env: NodeJS.ProcessEnv = process.env): Plan {
  let raw: unknown;
  try {
    raw = YAML.parse(expandVariables(content, env));
  } catch (err) {
    throw new ProvisionError(
      ErrorCode.PLAN_PARSE_ERROR,
      `Invalid YAML: ${err instanceof Error ? err.message : String(err)}`,
      'Check the plan file for syntax errors (indentation, colons, etc.)',
    );
  }

  // Pre-validation for better error messages
  const preError = preValidate(raw);
  if (preError) {
    throw new ProvisionError(ErrorCode.PLAN_VALIDATION_ERROR, preError);
  }

  const result = planWithRules.safeParse(raw);
  if (!result.success) {
    throw new ProvisionError(
      ErrorCode.PLAN_VALIDATION_ERROR,
      formatPlanError(result.error),
      'Fix the issues above and try again',
    );
  }

  return result.data;
}

/** Load and parse a plan file. Throws ProvisionError on failure. */
export function loadPlanFile(filePath: string, env: NodeJS.ProcessEnv = process.env): Plan {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    throw new ProvisionError(
      ErrorCode.PLAN_NOT_FOUND,
      `plan file not found: ${filePath}`,
      'Run: hostprep run <path-to-plan.yaml>',
    );
  }

  return parsePlanYaml(content, env);
}
