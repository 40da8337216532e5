import { createLocation, type Location } from "../common/location.js";

/** A cursor over the code points of a source file with line/column tracking. */
export class CharStream {
  readonly filePath: string;
  readonly contents: string[];
  readonly location = {
    index: 0,
    line: 1,
    column: 1,
  };

  constructor(contents: string, filePath: string) {
    this.contents = Array.from(contents);
    this.filePath = filePath;
  }

  /** Current index into `contents` (code points, not UTF-16 units) */
  get position() {
    return this.location.index;
  }

  get hasCharacters() {
    return this.position < this.contents.length;
  }

  get next(): string | undefined {
    return this.contents[this.position];
  }

  at(offset: number): string | undefined {
    return this.contents[this.position + offset];
  }

  currentLocation(): Location {
    return createLocation(
      this.filePath,
      this.location.line,
      this.location.column
    );
  }

  slice(start: number, end = this.position): string {
    return this.contents.slice(start, end).join("");
  }

  /** Returns the next character and removes it from the queue */
  consumeChar(): string {
    const char = this.contents[this.position];
    if (char === undefined) {
      throw new Error("Out of characters");
    }

    this.location.index += 1;
    this.location.column += 1;
    if (char === "\n") {
      this.location.line += 1;
      this.location.column = 1;
    }

    return char;
  }
}
