import { UNSET_POSITION, type FileRangeFields } from "./descriptors.js";
import { locationError } from "./errors.js";

/**
 * Accepted position shapes: a line, a line and column, or a full
 * start/end pair. Every shape normalizes to the same four-integer form.
 */
export type FilePosition =
  | readonly [line: number]
  | readonly [line: number, column: number]
  | readonly [
      startLine: number,
      startColumn: number,
      endLine: number,
      endColumn: number,
    ];

type RangeNumbers = Omit<FileRangeFields, "filename">;

const isPosition = (value: number): boolean =>
  Number.isInteger(value) && (value >= 0 || value === UNSET_POSITION);

const isSet = (value: number): boolean => value !== UNSET_POSITION;

/** Describes what is wrong with a range, or `undefined` when it is canonical. */
export const fileRangeProblem = (range: RangeNumbers): string | undefined => {
  const fields: (keyof RangeNumbers)[] = [
    "startLine",
    "startColumn",
    "endLine",
    "endColumn",
  ];
  for (const field of fields) {
    if (!isPosition(range[field])) {
      return `${field} must be a non-negative integer, got ${range[field]}`;
    }
  }

  if (!isSet(range.startLine) || !isSet(range.endLine)) {
    return "start and end lines must be set";
  }

  if (!isSet(range.startColumn)) {
    if (isSet(range.endColumn)) {
      return "an end column requires a start column";
    }
    return range.endLine === range.startLine
      ? undefined
      : "a range without columns cannot span lines";
  }

  if (!isSet(range.endColumn)) {
    return "a start column requires an end column";
  }

  const endsBeforeStart =
    range.endLine < range.startLine ||
    (range.endLine === range.startLine && range.endColumn < range.startColumn);
  return endsBeforeStart ? "range end precedes its start" : undefined;
};

const assertCanonical = (fields: FileRangeFields): Readonly<FileRangeFields> => {
  if (fields.filename.length === 0) {
    throw locationError({
      code: "LB0001",
      params: { kind: "missing-field", variant: "file-range", field: "filename" },
    });
  }
  const reason = fileRangeProblem(fields);
  if (reason !== undefined) {
    throw locationError({
      code: "LB0003",
      params: { kind: "invalid-range", filename: fields.filename, reason },
    });
  }
  return Object.freeze({
    filename: fields.filename,
    startLine: fields.startLine,
    startColumn: fields.startColumn,
    endLine: fields.endLine,
    endColumn: fields.endColumn,
  });
};

/** Validates a four-integer range. Applying it to its own output changes nothing. */
export const normalizeFileRange = (
  fields: FileRangeFields,
): Readonly<FileRangeFields> => assertCanonical(fields);

export const normalizeFilePosition = (
  filename: string,
  position: FilePosition,
): Readonly<FileRangeFields> => {
  if (position.length === 1) {
    const [line] = position;
    return assertCanonical({
      filename,
      startLine: line,
      startColumn: UNSET_POSITION,
      endLine: line,
      endColumn: UNSET_POSITION,
    });
  }

  if (position.length === 2) {
    const [line, column] = position;
    return assertCanonical({
      filename,
      startLine: line,
      startColumn: column,
      endLine: line,
      endColumn: column,
    });
  }

  const [startLine, startColumn, endLine, endColumn] = position;
  return assertCanonical({ filename, startLine, startColumn, endLine, endColumn });
};

export const normalizeColumnRange = (
  filename: string,
  line: number,
  startColumn: number,
  endColumn: number,
): Readonly<FileRangeFields> =>
  assertCanonical({ filename, startLine: line, startColumn, endLine: line, endColumn });

export const isLineOnly = (range: RangeNumbers): boolean =>
  !isSet(range.startColumn) && range.startLine === range.endLine;

export const isPoint = (range: RangeNumbers): boolean =>
  isSet(range.startColumn) &&
  range.startLine === range.endLine &&
  range.startColumn === range.endColumn;

/**
 * Whether `line`/`column` falls inside the range, ends inclusive. Without a
 * column only the line is compared; a line-only range holds every column of
 * its line.
 */
export const containsPosition = (
  range: RangeNumbers,
  line: number,
  column: number = UNSET_POSITION,
): boolean => {
  if (line < range.startLine || line > range.endLine) {
    return false;
  }
  if (!isSet(column) || !isSet(range.startColumn)) {
    return true;
  }
  if (line === range.startLine && column < range.startColumn) {
    return false;
  }
  return !(line === range.endLine && column > range.endColumn);
};
