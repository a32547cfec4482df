/**
 * Parsing of Lab Object Identifiers (LOIs) into their parts.
 */

import {
  LOI_SEPARATOR,
  LOI_TYPES,
  ROOT_ISSUER_SEPARATOR,
  checkLoi,
  type CheckerId,
  type LoiType,
} from './loi-checker.js';
import { InvalidLoiError, MissingLoiError } from './errors.js';

/**
 * Parsing only needs root and type to be right: LOIs that are still
 * prefixes awaiting a numeric slot must parse as well.
 */
const PARSER_SKIP: ReadonlySet<CheckerId> = new Set<CheckerId>(['datasetKind']);

/**
 * A parsed LOI. Serializes back to the string it was parsed from.
 */
export class Loi {
  private readonly segments: readonly string[];

  constructor(
    readonly root: string,
    readonly issuer: string,
    readonly type: LoiType,
    idPath: readonly string[]
  ) {
    this.segments = [...idPath];
  }

  /** Type-specific segments, e.g. ["exp", "sa", "42", "cwepr", "1"] */
  get idPath(): string[] {
    return [...this.segments];
  }

  /** Type-specific part, e.g. "exp/sa/42/cwepr/1" */
  get id(): string {
    return this.segments.join(LOI_SEPARATOR);
  }

  /** "42.1001" */
  get prefix(): string {
    return this.root + ROOT_ISSUER_SEPARATOR + this.issuer;
  }

  /** The same LOI with another type-specific part. */
  withIdPath(idPath: readonly string[]): Loi {
    return new Loi(this.root, this.issuer, this.type, idPath);
  }

  toString(): string {
    return [this.prefix, this.type, ...this.segments].join(LOI_SEPARATOR);
  }
}

function isLoiType(value: string): value is LoiType {
  return LOI_TYPES.some(type => type === value);
}

/**
 * Parse a LOI string.
 *
 * @throws {MissingLoiError} for an empty string
 * @throws {InvalidLoiError} if root or type are wrong
 */
export function parseLoi(loi: string): Loi {
  if (!loi) throw new MissingLoiError();
  if (!checkLoi(loi, { skip: PARSER_SKIP })) {
    throw new InvalidLoiError('String is not a valid LOI.', { loi });
  }

  const [rootIssuer, type, ...id] = loi.split(LOI_SEPARATOR);
  const separatorIndex = rootIssuer.indexOf(ROOT_ISSUER_SEPARATOR);
  if (!isLoiType(type)) {
    throw new InvalidLoiError('String is not a valid LOI.', { loi });
  }

  return new Loi(
    rootIssuer.slice(0, separatorIndex),
    rootIssuer.slice(separatorIndex + 1),
    type,
    id
  );
}

/**
 * Stateful parser remembering the last LOI parsed.
 */
export class LoiParser {
  private current: Loi | undefined;

  get loi(): Loi | undefined {
    return this.current;
  }

  parse(loi: string): Loi {
    this.current = parseLoi(loi);
    return this.current;
  }

  /** Segments of the last parsed LOI's id, or an empty list before any parse. */
  splitIdPath(): string[] {
    return this.current ? this.current.idPath : [];
  }
}
