export class ChunkJoinError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChunkJoinError";
  }
}

export class UsageError extends ChunkJoinError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class PolicyError extends ChunkJoinError {
  constructor(message: string) {
    super(message);
    this.name = "PolicyError";
  }
}

/**
 * Manifest missing, unsupported format tag, malformed field or part line,
 * or an empty part list.
 */
export class ManifestError extends ChunkJoinError {
  readonly manifestPath: string;

  constructor(manifestPath: string, message: string) {
    super(message);
    this.name = "ManifestError";
    this.manifestPath = manifestPath;
  }
}

/**
 * Raised once every listed part has been looked at, naming all absent ones.
 */
export class MissingPartsError extends ChunkJoinError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`missing parts (${missing.length}): ${missing.join(", ")}`);
    this.name = "MissingPartsError";
    this.missing = missing;
  }
}

export class PartDigestMismatchError extends ChunkJoinError {
  readonly part: string;
  readonly expected: string;
  readonly actual: string;

  constructor(part: string, expected: string, actual: string) {
    super(`checksum mismatch for part ${part} (expected ${expected}, got ${actual})`);
    this.name = "PartDigestMismatchError";
    this.part = part;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * The reassembled file is left on disk when this is thrown.
 */
export class FinalDigestMismatchError extends ChunkJoinError {
  readonly outputPath: string;
  readonly expected: string;
  readonly actual: string;

  constructor(outputPath: string, expected: string, actual: string) {
    super(`final sha256 mismatch for ${outputPath} (expected ${expected}, got ${actual})`);
    this.name = "FinalDigestMismatchError";
    this.outputPath = outputPath;
    this.expected = expected;
    this.actual = actual;
  }
}
