import { z } from 'zod';

// ── Defaults (centralized) ──

export const PLAN_DEFAULTS = {
  timeout_sec: 900,
  authorized_keys_path: '~/.ssh/authorized_keys',
  sshd_config_path: '/etc/ssh/sshd_config',
  key_prompt: 'Enter the SSH key to add',
} as const;

export const CHECK_DEFAULTS = {
  cmd_timeout_sec: 120,
} as const;

// ── Reusable primitives ──

const kebabCase = z
  .string()
  .min(1)
  .regex(/^[a-z0-9][a-z0-9-]*$/, 'must be kebab-case');

const commandName = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9._+-]+$/, 'must be a bare command name');

const singleLine = z
  .string()
  .min(1)
  .regex(/^[^\r\n]+$/, 'must be a single line');

// ── Check schemas ──

const commandExistsCheck = z.object({
  type: z.literal('command_exists'),
  name: commandName,
});

const cmdSucceedsCheck = z.object({
  type: z.literal('cmd_succeeds'),
  cmd: z.string().min(1),
  timeout_sec: z.number().min(1).default(CHECK_DEFAULTS.cmd_timeout_sec),
});

const fileExistsCheck = z.object({
  type: z.literal('file_exists'),
  path: z.string().min(1),
});

const fileContainsCheck = z.object({
  type: z.literal('file_contains'),
  path: z.string().min(1),
  pattern: z.string().min(1),
});

// ── Short format normalization ──

/**
 * Normalize a short-format check entry into object format.
 *
 * Short format examples:
 *   - `command_exists: gh`
 *   - `cmd_succeeds: "docker info"`
 *   - `file_exists: /etc/apt/keyrings/docker.asc`
 */
export function normalizeCheck(raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return raw;
  }

  // Already has `type` field → object format, pass through
  if ('type' in raw) return raw;

  const entries = Object.entries(raw);
  const [first] = entries;
  if (entries.length !== 1 || first === undefined) return raw;

  const [type, value] = first;
  switch (type) {
    case 'command_exists':
      return { type, name: String(value) };
    case 'cmd_succeeds':
      return { type, cmd: String(value) };
    case 'file_exists':
      return { type, path: String(value) };
    default:
      // file_contains has no short format
      return raw;
  }
}

export const checkSchema = z.preprocess(
  normalizeCheck,
  z.discriminatedUnion('type', [
    commandExistsCheck,
    cmdSucceedsCheck,
    fileExistsCheck,
    fileContainsCheck,
  ]),
);

// ── Step schemas ──

const stepBase = {
  name: kebabCase,
  description: z.string().optional(),
};

const shellStepSchema = z.object({
  ...stepBase,
  kind: z.literal('shell'),
  check: z.array(checkSchema).default([]),
  run: z.array(z.string().min(1)).min(1),
  verify: z.array(checkSchema).default([]),
  timeout_sec: z.number().min(1).optional(),
  env: z.record(z.string()).default({}),
});

const authorizedKeyStepSchema = z.object({
  ...stepBase,
  kind: z.literal('authorized_key'),
  path: z.string().min(1).default(PLAN_DEFAULTS.authorized_keys_path),
  key: z.string().optional(),
  prompt: z.string().min(1).default(PLAN_DEFAULTS.key_prompt),
});

const sshdConfigStepSchema = z.object({
  ...stepBase,
  kind: z.literal('sshd_config'),
  path: z.string().min(1).default(PLAN_DEFAULTS.sshd_config_path),
  directives: z
    .record(z.string().regex(/^[A-Za-z][A-Za-z0-9]*$/, 'must be an sshd keyword'), singleLine)
    .refine((d) => Object.keys(d).length > 0, 'at least one directive is required'),
  restart: z.string().min(1).optional(),
});

export const stepSchema = z.discriminatedUnion('kind', [
  shellStepSchema,
  authorizedKeyStepSchema,
  sshdConfigStepSchema,
]);

// ── Plan schema ──

export const planSchema = z.object({
  name: kebabCase,
  description: z.string().optional(),
  timeout_sec: z.number().min(1).default(PLAN_DEFAULTS.timeout_sec),
  env: z.record(z.string()).default({}),
  steps: z.array(stepSchema).min(1),
});

// ── Derived TypeScript types ──

export type CheckSpec = z.infer<typeof checkSchema>;
export type StepDef = z.infer<typeof stepSchema>;
export type ShellStepDef = z.infer<typeof shellStepSchema>;
export type AuthorizedKeyStepDef = z.infer<typeof authorizedKeyStepSchema>;
export type SshdConfigStepDef = z.infer<typeof sshdConfigStepSchema>;
export type Plan = z.infer<typeof planSchema>;
