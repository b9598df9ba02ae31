export type LoadRequestFileResult =
  | { kind: 'file_not_found'; filePath: string }
  | { kind: 'read_error'; filePath: string; message: string; code?: string }
  | { kind: 'json_parse_error'; filePath: string; message: string }
  | { kind: 'loaded'; filePath: string; body: unknown };

export interface LoadRequestFileDeps {
  readonly resolvePath: (filePath: string) => string;
  readonly existsSync: (resolvedPath: string) => boolean;
  readonly readFileSyncUtf8: (resolvedPath: string) => string;
  readonly parseJson: (content: string) => unknown;
}

/**
 * Read and JSON-parse a request (or saved response) file.
 * Shape checks are left to the consumer.
 */
export function createLoadRequestFileUseCase(deps: LoadRequestFileDeps) {
  return function loadRequestFile(filePath: string): LoadRequestFileResult {
    const resolvedPath = deps.resolvePath(filePath);

    if (!deps.existsSync(resolvedPath)) {
      return { kind: 'file_not_found', filePath };
    }

    let content: string;
    try {
      content = deps.readFileSyncUtf8(resolvedPath);
    } catch (e) {
      return { kind: 'read_error', filePath, message: errorMessage(e), code: errorCode(e) };
    }

    try {
      return { kind: 'loaded', filePath, body: deps.parseJson(content) };
    } catch (e) {
      return { kind: 'json_parse_error', filePath, message: errorMessage(e) };
    }
  };
}

export type LoadRequestFileUseCase = ReturnType<typeof createLoadRequestFileUseCase>;

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function errorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}
