/**
 * Error taxonomy shared by guards, tool handlers and the executor.
 *
 * Handlers throw {@link ToolError}; the executor turns whatever was thrown into
 * a failed ToolResult with {@link toToolError}, so nothing escapes `execute`.
 */

export type ToolErrorKind =
  | 'SecurityDenied'
  | 'NotFound'
  | 'NoOp'
  | 'Timeout'
  | 'Disconnected'
  | 'Unavailable'
  | 'Cancelled'
  | 'MalformedResponse'
  | 'InvalidArguments'
  | 'UnknownTool'
  | 'ExecutionFailed';

export class ToolError extends Error {
  readonly kind: ToolErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ToolErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ToolError';
    this.kind = kind;
    this.details = details;
  }
}

/**
 * A path that canonicalizes outside the project root.
 */
export class PathEscapeError extends ToolError {
  readonly requestedPath: string;

  constructor(requestedPath: string, canonical?: string) {
    super(
      'SecurityDenied',
      canonical === undefined
        ? `Path escapes workspace: ${requestedPath}`
        : `Path escapes workspace: ${requestedPath} (resolves to ${canonical})`,
      { path: requestedPath, ...(canonical !== undefined && { canonical }) }
    );
    this.name = 'PathEscapeError';
    this.requestedPath = requestedPath;
  }
}

export function isToolError(err: unknown): err is ToolError {
  return err instanceof ToolError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node's fs errors carry a string `code` such as ENOENT. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function toToolError(err: unknown): ToolError {
  if (isToolError(err)) {
    return err;
  }
  const code = errnoCode(err);
  if (code === 'ENOENT') {
    return new ToolError('NotFound', errorMessage(err));
  }
  if (code === 'EISDIR' || code === 'ENOTDIR') {
    return new ToolError('InvalidArguments', errorMessage(err));
  }
  return new ToolError('ExecutionFailed', errorMessage(err));
}
