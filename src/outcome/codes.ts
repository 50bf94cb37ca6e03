import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0100: { code: "E0100", severity: "error", category: "Lookup", template: "Bad {label}: {value}" },
  E0101: { code: "E0101", severity: "error", category: "Lookup", template: "Ambiguous {label}: {value}" },

  E0200: { code: "E0200", severity: "error", category: "Conversion", template: "Cannot convert value to {type}" },
  E0201: { code: "E0201", severity: "error", category: "Conversion", template: "Unknown value type: {type}" },

  E0300: { code: "E0300", severity: "error", category: "Table", template: "Malformed keyword table: {detail}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    data: params,
  };
}
