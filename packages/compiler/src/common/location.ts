export interface Location {
  file: string;
  /** 1-based; 0 marks a location that does not point into source */
  line: number;
  column: number;
}

export const createLocation = (
  file: string,
  line = 1,
  column = 1
): Location => ({ file, line, column });

export const emptyLocation = (): Location => ({ file: "", line: 0, column: 0 });

export const isEmptyLocation = (location: Location): boolean =>
  location.line === 0;

export const formatLocation = (location: Location): string =>
  isEmptyLocation(location)
    ? ""
    : `line ${location.line}, column ${location.column} of ${location.file}`;

/** Orders locations by (line, column); the file is not compared. */
export const compareLocations = (a: Location, b: Location): number =>
  a.line === b.line ? a.column - b.column : a.line - b.line;
