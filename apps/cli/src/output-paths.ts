import { basename } from "node:path";

export const SOURCE_EXTENSION = ".vn";

/** Files derived from one source path; all live beside the source. */
export type OutputPaths = {
  assembly: string;
  object: string;
  executable: string;
  parseTree: string;
  typedTree: string;
  vil: string;
};

export const isSourcePath = (path: string): boolean =>
  path.endsWith(SOURCE_EXTENSION) && basename(path).length > SOURCE_EXTENSION.length;

export const outputPaths = (input: string): OutputPaths => {
  if (!isSourcePath(input)) {
    throw new Error(`expected a ${SOURCE_EXTENSION} file, got ${input}`);
  }

  const stem = input.slice(0, -SOURCE_EXTENSION.length);
  return {
    assembly: `${stem}.s`,
    object: `${stem}.o`,
    executable: stem,
    parseTree: `${stem}.ptree`,
    typedTree: `${stem}.ast`,
    vil: `${stem}.vil`,
  };
};
