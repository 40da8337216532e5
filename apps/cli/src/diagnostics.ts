import {
  formatLocation,
  isEmptyLocation,
  type Diagnostic,
  type DiagnosticSeverity,
} from "@venice/compiler";

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  muted: (text: string) => string;
};

const colorForSeverity = (
  severity: DiagnosticSeverity
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity,
      pointer: (_severity, text) => text,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) => bold(colorForSeverity(severity)(severity)),
    pointer: (severity, text) => colorForSeverity(severity)(text),
    muted: dim,
  };
};

const formatSnippet = ({
  diagnostic,
  source,
  color,
}: {
  diagnostic: Diagnostic;
  source: string;
  color: Colorizer;
}): string | undefined => {
  const { line, column } = diagnostic.location;
  const lineText = source.split("\n")[line - 1];
  if (lineText === undefined) return undefined;

  const gutter = `${line}`;
  const padding = " ".repeat(gutter.length);
  const marker = `${" ".repeat(Math.max(0, column - 1))}${color.pointer(
    diagnostic.severity,
    "^"
  )}`;

  return [
    `${padding} |`,
    `${gutter} | ${lineText}`,
    `${padding} | ${marker} ${color.muted(diagnostic.message)}`,
  ].join("\n");
};

/**
 * `error: <message> (<location>)`, followed by the offending source line
 * when the source text is available.
 */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { source?: string; color?: boolean } = {}
): string => {
  const color = createColorizer(options.color ?? true);
  const located = !isEmptyLocation(diagnostic.location);
  const header = `${color.severityLabel(diagnostic.severity)}: ${diagnostic.message}${
    located ? ` (${formatLocation(diagnostic.location)})` : ""
  }`;
  const snippet =
    options.source === undefined || !located
      ? undefined
      : formatSnippet({ diagnostic, source: options.source, color });

  return [header, snippet].filter(Boolean).join("\n");
};
