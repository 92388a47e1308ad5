// ── Host capabilities ──

export interface PrivilegeStatus {
  ok: boolean;
  /** Who the process runs as, for error messages */
  user: string;
}

export interface PrivilegeProbe {
  check(): PrivilegeStatus;
}

export interface ExecOptions {
  timeout_sec?: number;
  env?: Record<string, string>;
}

export interface CommandResult {
  exit_code: number;
  stdout: string;
  stderr: string;
  timed_out: boolean;
  duration_ms: number;
}

export interface CommandExecutor {
  exec(cmd: string, options?: ExecOptions): Promise<CommandResult>;
}

/** Source of free-text operator input (e.g. an SSH public key) */
export interface InputProvider {
  ask(question: string): Promise<string>;
}

/**
 * Everything steps and the runner need from the host, passed explicitly.
 */
export interface ProvisionContext {
  readonly privilege: PrivilegeProbe;
  readonly exec: CommandExecutor;
  readonly input: InputProvider;
  readonly homeDir: string;
}
