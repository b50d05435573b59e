// ===========================================================================
// Render Errors
//
// Every failure raised by parsing, timeline building or mixing is a
// RenderError subclass, so callers can branch on `code` (or instanceof)
// without string matching.
// ===========================================================================

export type RenderErrorCode =
  | 'PARSE_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'ASSET_RESOLUTION_ERROR'
  | 'ANCHOR_ERROR'
  | 'EMPTY_DOCUMENT'
  | 'EXTERNAL_TOOL_FAILURE';

export class RenderError extends Error {
  readonly code: RenderErrorCode;

  constructor(message: string, code: RenderErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed script line. Carries the 1-based line number and the raw line text. */
export class ParseError extends RenderError {
  constructor(
    readonly lineNumber: number,
    readonly rawLine: string,
    reason: string
  ) {
    super(`Parse error on line ${lineNumber}: ${reason} -> ${JSON.stringify(rawLine)}`, 'PARSE_ERROR');
  }
}

export class ConfigurationError extends RenderError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
  }
}

export class AssetResolutionError extends RenderError {
  constructor(
    readonly assetId: string,
    readonly triedPaths: string[]
  ) {
    super(`Asset not found: ${assetId} (tried ${triedPaths.join(', ')})`, 'ASSET_RESOLUTION_ERROR');
  }
}

export class AnchorError extends RenderError {
  constructor(
    readonly anchor: string,
    readonly lineNumber?: number
  ) {
    super(
      lineNumber !== undefined
        ? `Unknown SFX anchor "${anchor}" on line ${lineNumber} (expected now, last_start or last_end)`
        : `Unknown SFX anchor "${anchor}" (expected now, last_start or last_end)`,
      'ANCHOR_ERROR'
    );
  }
}

export class EmptyDocumentError extends RenderError {
  constructor() {
    super('Empty document: the script contains no narration lines', 'EMPTY_DOCUMENT');
  }
}

export type ExternalTool = 'voice' | 'probe' | 'silence' | 'mix';

export class ExternalToolError extends RenderError {
  constructor(
    readonly tool: ExternalTool,
    message: string,
    cause?: unknown
  ) {
    super(`${tool} failed: ${message}`, 'EXTERNAL_TOOL_FAILURE', { cause });
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
