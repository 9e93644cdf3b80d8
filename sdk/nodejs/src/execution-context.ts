export type ExecutionMode = "run" | "publish";

/**
 * Process-wide execution mode, fixed once at startup.
 *
 * Run mode resolves endpoints and parameters to concrete values; publish mode
 * renders them as symbolic manifest placeholders.
 */
export interface ExecutionContext {
  readonly mode: ExecutionMode;
  readonly isRunMode: boolean;
  readonly isPublishMode: boolean;
  /** Publisher selected with `--publisher`, only set in publish mode. */
  readonly publisher?: string;
  readonly outputPath?: string;
}
