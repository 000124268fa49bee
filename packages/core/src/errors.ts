// morphochart/errors - Error taxonomy shared by every package

export class MorphochartError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MorphochartError';
  }
}

/**
 * Empty or malformed caller input: a word, a symbol sequence, a symbol key,
 * a resource row. Never worth retrying.
 */
export class InvalidInputError extends MorphochartError {
  constructor(message: string, public readonly input?: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * A symbol sequence that the automaton has no path for. This is the normal
 * "word not in this chart" outcome of a query.
 */
export class NoSuchPathError extends MorphochartError {
  constructor(
    public readonly keys: readonly string[],
    public readonly index: number,
    public readonly stateId: number
  ) {
    super(`No transition for "${keys[index]}" from state ${stateId} (symbol ${index + 1} of ${keys.length}: ${keys.join(' ')})`);
    this.name = 'NoSuchPathError';
  }
}
