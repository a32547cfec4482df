/**
 * Lab Object Identifier (LOI) validation.
 *
 * A LOI is checked segment by segment: each checker consumes the first
 * `/`-delimited segment of what is left, decides on that segment alone and
 * names the checker that gets the remaining segments. Together the checkers
 * form the grammar tree of the LOI:
 *
 * ```
 * 42.<issuer> / ds   / exp  / <YYYY-MM-DD>      / cwepr|trepr / <n>
 *                           / ba|sa / <n>       / cwepr|trepr / <n>
 *                    / calc / geo|result / <n>
 *              / rec  / <n>
 *              / img  / <anything>
 *              / info / <initials> / sample      / batch|sample|... / <n>
 *                                  / calculation / molecule|...     / <n>
 *                                  / project|... / <friendly-string>
 * ```
 */

export const LOI_ROOT = '42';
export const LOI_SEPARATOR = '/';
export const ROOT_ISSUER_SEPARATOR = '.';

export const LOI_TYPES = ['ds', 'rec', 'img', 'info'] as const;
export type LoiType = (typeof LOI_TYPES)[number];

export const DATASET_KINDS = ['exp', 'calc'] as const;
export const SAMPLE_PREFIXES = ['ba', 'sa'] as const;
export const MEASUREMENT_METHODS = ['cwepr', 'trepr'] as const;
export const CALCULATION_KINDS = ['geo', 'result'] as const;
export const INFO_ISSUERS = ['tb', 'ms', 'jp', 'dm', 'cm'] as const;
export const INFO_KINDS = [
  'sample',
  'calculation',
  'project',
  'publication',
  'grant',
  'device',
  'chemical',
  'person',
] as const;
export const INFO_SAMPLE_OBJECTS = ['batch', 'sample', 'substrate', 'synthesis', 'cell', 'tube'] as const;
export const INFO_CALCULATION_OBJECTS = ['molecule', 'geometry', 'calculation'] as const;

const NUMBER_PATTERN = /^\d+$/;
// Format only; 2020-02-31 passes
const DATE_PATTERN = /^\d{4}-[0-1][0-9]-[0-3][0-9]$/;
const FRIENDLY_STRING_PATTERN = /^[a-z0-9_-]+$/;

export type CheckerId =
  | 'root'
  | 'type'
  | 'datasetKind'
  | 'experimentObject'
  | 'sampleNumber'
  | 'measurementMethod'
  | 'measurementNumber'
  | 'calculationKind'
  | 'calculationNumber'
  | 'recipeNumber'
  | 'image'
  | 'infoIssuer'
  | 'infoKind'
  | 'infoSampleObject'
  | 'infoCalculationObject'
  | 'infoObjectNumber'
  | 'infoFriendlyString';

/**
 * Successor of a checker: fixed, chosen from the accepted segment, or none.
 */
export type Successor =
  | { kind: 'static'; next: CheckerId }
  | { kind: 'dynamic'; select: (segment: string) => CheckerId | undefined }
  | { kind: 'terminal' };

export interface SegmentChecker {
  readonly id: CheckerId;
  /** Decide on one segment. */
  accepts(segment: string): boolean;
  readonly successor: Successor;
  /** Accept every remaining segment instead of only the first one. */
  readonly greedy?: boolean;
}

export interface ValidationOptions {
  /** Checkers whose segment test is bypassed for this run. */
  readonly skip?: ReadonlySet<CheckerId>;
}

function inList(list: readonly string[]): (segment: string) => boolean {
  return segment => list.includes(segment);
}

function isNumber(segment: string): boolean {
  return NUMBER_PATTERN.test(segment);
}

export function isDate(segment: string): boolean {
  return DATE_PATTERN.test(segment);
}

function isFriendlyString(segment: string): boolean {
  return FRIENDLY_STRING_PATTERN.test(segment);
}

const TYPE_ROUTES: Record<LoiType, CheckerId> = {
  ds: 'datasetKind',
  rec: 'recipeNumber',
  img: 'image',
  info: 'infoIssuer',
};

const DATASET_KIND_ROUTES: Record<(typeof DATASET_KINDS)[number], CheckerId> = {
  exp: 'experimentObject',
  calc: 'calculationKind',
};

const INFO_KIND_ROUTES: Record<(typeof INFO_KINDS)[number], CheckerId> = {
  sample: 'infoSampleObject',
  calculation: 'infoCalculationObject',
  project: 'infoFriendlyString',
  publication: 'infoFriendlyString',
  grant: 'infoFriendlyString',
  device: 'infoFriendlyString',
  chemical: 'infoFriendlyString',
  person: 'infoFriendlyString',
};

function route(routes: Record<string, CheckerId>): (segment: string) => CheckerId | undefined {
  const table = new Map(Object.entries(routes));
  return segment => table.get(segment);
}

/**
 * The complete grammar. Closed: no checker is looked up by anything but its id.
 */
export const CHECKERS: Readonly<Record<CheckerId, SegmentChecker>> = {
  root: {
    id: 'root',
    accepts: segment => segment.startsWith(LOI_ROOT + ROOT_ISSUER_SEPARATOR),
    successor: { kind: 'static', next: 'type' },
  },
  type: {
    id: 'type',
    accepts: inList(LOI_TYPES),
    successor: { kind: 'dynamic', select: route(TYPE_ROUTES) },
  },
  datasetKind: {
    id: 'datasetKind',
    accepts: inList(DATASET_KINDS),
    successor: { kind: 'dynamic', select: route(DATASET_KIND_ROUTES) },
  },
  experimentObject: {
    id: 'experimentObject',
    accepts: segment => isDate(segment) || inList(SAMPLE_PREFIXES)(segment),
    successor: {
      kind: 'dynamic',
      select: segment => (isDate(segment) ? 'measurementMethod' : 'sampleNumber'),
    },
  },
  sampleNumber: {
    id: 'sampleNumber',
    accepts: isNumber,
    successor: { kind: 'static', next: 'measurementMethod' },
  },
  measurementMethod: {
    id: 'measurementMethod',
    accepts: inList(MEASUREMENT_METHODS),
    successor: { kind: 'static', next: 'measurementNumber' },
  },
  measurementNumber: {
    id: 'measurementNumber',
    accepts: isNumber,
    successor: { kind: 'terminal' },
  },
  calculationKind: {
    id: 'calculationKind',
    accepts: inList(CALCULATION_KINDS),
    successor: { kind: 'static', next: 'calculationNumber' },
  },
  calculationNumber: {
    id: 'calculationNumber',
    accepts: isNumber,
    successor: { kind: 'terminal' },
  },
  recipeNumber: {
    id: 'recipeNumber',
    accepts: isNumber,
    successor: { kind: 'terminal' },
  },
  image: {
    id: 'image',
    accepts: () => true,
    successor: { kind: 'terminal' },
    greedy: true,
  },
  infoIssuer: {
    id: 'infoIssuer',
    accepts: inList(INFO_ISSUERS),
    successor: { kind: 'static', next: 'infoKind' },
  },
  infoKind: {
    id: 'infoKind',
    accepts: inList(INFO_KINDS),
    successor: { kind: 'dynamic', select: route(INFO_KIND_ROUTES) },
  },
  infoSampleObject: {
    id: 'infoSampleObject',
    accepts: inList(INFO_SAMPLE_OBJECTS),
    successor: { kind: 'static', next: 'infoObjectNumber' },
  },
  infoCalculationObject: {
    id: 'infoCalculationObject',
    accepts: inList(INFO_CALCULATION_OBJECTS),
    successor: { kind: 'static', next: 'infoObjectNumber' },
  },
  infoObjectNumber: {
    id: 'infoObjectNumber',
    accepts: isNumber,
    successor: { kind: 'terminal' },
  },
  infoFriendlyString: {
    id: 'infoFriendlyString',
    accepts: isFriendlyString,
    successor: { kind: 'terminal' },
  },
};

/**
 * Run the cascade from `checkerId` on the remaining segments.
 *
 * A bypassed checker accepts its segment without looking at it and hands
 * the rest to its static successor. A bypassed checker that would choose its
 * successor from the segment value ends the cascade there, accepting the rest.
 */
function checkSegments(checkerId: CheckerId, segments: readonly string[], options: ValidationOptions): boolean {
  const checker = CHECKERS[checkerId];
  const [segment = '', ...rest] = segments;
  const skipped = options.skip?.has(checkerId) ?? false;

  if (skipped) {
    if (checker.greedy) return true;
    switch (checker.successor.kind) {
      case 'static':
        return checkSegments(checker.successor.next, rest, options);
      case 'dynamic':
        return true;
      case 'terminal':
        return rest.length === 0;
    }
  }

  if (checker.greedy) return segments.every(s => checker.accepts(s));
  if (!checker.accepts(segment)) return false;

  switch (checker.successor.kind) {
    case 'static':
      return checkSegments(checker.successor.next, rest, options);
    case 'dynamic': {
      const next = checker.successor.select(segment);
      return next === undefined ? false : checkSegments(next, rest, options);
    }
    case 'terminal':
      return rest.length === 0;
  }
}

/**
 * Check a string for being a valid LOI. Never throws.
 *
 * @example
 * checkLoi('42.1001/ds/exp/sa/42/cwepr/1'); // true
 * checkLoi('42.1001/ds/exp/sa/42/cwepr', { skip: new Set(['measurementNumber']) }); // true
 */
export function checkLoi(loi: string, options: ValidationOptions = {}): boolean {
  if (typeof loi !== 'string' || loi.length === 0) return false;
  return checkSegments('root', loi.split(LOI_SEPARATOR), options);
}

/**
 * Reusable checker with a fixed set of bypassed checkers.
 */
export class LoiChecker {
  private readonly options: ValidationOptions;

  constructor(skip: Iterable<CheckerId> = []) {
    this.options = { skip: new Set(skip) };
  }

  check(loi: string): boolean {
    return checkLoi(loi, this.options);
  }

  /** A new checker bypassing `checkerId` in addition. */
  skipping(checkerId: CheckerId): LoiChecker {
    return new LoiChecker([...(this.options.skip ?? []), checkerId]);
  }
}
