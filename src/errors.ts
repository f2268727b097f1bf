/**
 * Base class for every error raised by kvtree.
 *
 * Core functions throw these to the caller and never recover internally;
 * the CLI turns them into a message and a non-zero exit code.
 */
export class KvTreeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A tree mixes leaf values and subtrees in one node, or a flat path collides
 * with another path while being nested.
 */
export class MalformedTreeError extends KvTreeError {}

/**
 * The root element of a tree cannot be determined because it has zero or
 * several top-level keys.
 */
export class AmbiguousRootError extends KvTreeError {
  constructor(
    readonly candidates: string[],
    options?: { cause?: unknown; hint?: string },
  ) {
    const reason =
      candidates.length === 0
        ? 'cannot determine root element: input has no top-level path'
        : `cannot determine root element: expected exactly one top-level path, found ${candidates.length} (${candidates.join(', ')})`;
    super(options?.hint ? `${reason}. ${options.hint}` : reason, {
      cause: options?.cause,
    });
  }
}

export class UnsupportedFormatError extends KvTreeError {
  constructor(readonly format: string) {
    super(
      `unsupported output format '${format}'. Supported formats: native, json, yaml, shell-export`,
    );
  }
}

/** Input is neither valid JSON nor valid YAML. */
export class ParseError extends KvTreeError {}

/** Mutually exclusive or out-of-range options. */
export class InvalidOptionsError extends KvTreeError {}

export class EngineExistsError extends KvTreeError {
  constructor(readonly enginePath: string) {
    super(
      `engine path '${enginePath}' already contains secrets. Use --force to write into it anyway`,
    );
  }
}

/** A call to the secret store failed. */
export class BackendError extends KvTreeError {}
