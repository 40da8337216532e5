import type { Location } from "../common/location.js";

export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase = "lexer" | "parser" | "analyzer";

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  location: Location;
  phase?: DiagnosticPhase;
}

export type DiagnosticInput = {
  code: string;
  message: string;
  location: Location;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
};
