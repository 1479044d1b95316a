import { ID_CLASS_INFO, ID_MAX, ID_MIN, type IdClass, type IdSide } from './ids';

// Stable codes; scripts consuming --json or stderr may match on them.
export type IdmapErrorCode =
  | 'out-of-range'
  | 'structural-conflict'
  | 'no-input'
  | 'malformed-token'
  | 'invalid-config';

export abstract class IdmapError extends Error {
  abstract readonly code: IdmapErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class OutOfRangeError extends IdmapError {
  readonly code = 'out-of-range';

  constructor(
    readonly id: number,
    readonly idClass: IdClass,
    readonly side: IdSide
  ) {
    super(`${side} ${ID_CLASS_INFO[idClass].label} ${id} is not in range ${ID_MIN}-${ID_MAX}`);
  }
}

export class StructuralConflictError extends IdmapError {
  readonly code = 'structural-conflict';

  constructor(
    readonly idClass: IdClass,
    readonly containerId: number,
    readonly hostIds: readonly [number, number]
  ) {
    super(
      `container ${ID_CLASS_INFO[idClass].label} ${containerId} is mapped more than once (to ${hostIds[0]} and ${hostIds[1]})`
    );
  }
}

export class NoInputError extends IdmapError {
  readonly code = 'no-input';

  constructor() {
    super('no mappings given: pass at least one mapping, --user or --group');
  }
}

export class MalformedTokenError extends IdmapError {
  readonly code = 'malformed-token';

  constructor(
    readonly token: string,
    readonly reason: string
  ) {
    super(`invalid mapping '${token}': ${reason}`);
  }
}

export class ConfigError extends IdmapError {
  readonly code = 'invalid-config';
}

export function isIdmapError(value: unknown): value is IdmapError {
  return value instanceof IdmapError;
}
