export * from "./types.js";
export * from "./registry.js";

import { formatLocation, isEmptyLocation } from "../common/location.js";
import type { Location } from "../common/location.js";
import type {
  Diagnostic,
  DiagnosticInput,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";
import {
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

const codePhasePrefixes: Record<string, DiagnosticPhase> = {
  LX: "lexer",
  PS: "parser",
  TY: "analyzer",
};

const inferPhase = (code: string): DiagnosticPhase | undefined => {
  const prefix = code.slice(0, 2).toUpperCase();
  return codePhasePrefixes[prefix];
};

export const createDiagnostic = ({
  severity,
  phase,
  ...input
}: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
  phase: phase ?? inferPhase(input.code),
});

export type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  location: Location;
  severity?: DiagnosticSeverity;
};

export const diagnosticFromCode = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>
): Diagnostic => {
  const definition = getDiagnosticDefinition(options.code);
  return createDiagnostic({
    code: options.code,
    message: formatDiagnosticMessage(options.code, options.params),
    location: options.location,
    severity: options.severity ?? definition.severity,
    phase: definition.phase,
  });
};

/** Renders `error: <message> (<location>)`. */
export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const header = `${diagnostic.severity}: ${diagnostic.message}`;
  return isEmptyLocation(diagnostic.location)
    ? header
    : `${header} (${formatLocation(diagnostic.location)})`;
};

export class DiagnosticEmitter {
  #diagnostics: Diagnostic[] = [];

  report<K extends DiagnosticCode>(
    options: RegistryDiagnosticOptions<K>
  ): Diagnostic {
    const diagnostic = diagnosticFromCode(options);
    this.#diagnostics.push(diagnostic);
    return diagnostic;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }
}

/** A violated precondition inside the compiler itself; never user-facing input. */
export class InternalCompilerError extends Error {
  constructor(message: string) {
    super(`internal compiler error: ${message}`);
    this.name = "InternalCompilerError";
  }
}
