import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function err(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>,
  meta: OutcomeMeta = {}
): Fail {
  return fail(failure(reason, message, opts), meta);
}

export function noMatch(
  label: string,
  value: string,
  message: string,
  meta: OutcomeMeta = {}
): Fail {
  return fail(
    failure("no-match", message, {
      diagnostics: [makeDiagnostic("E0100", { label, value })],
      context: { label, value },
      recoverable: true,
    }),
    meta
  );
}

export function ambiguous(
  label: string,
  value: string,
  message: string,
  candidates: string[],
  meta: OutcomeMeta = {}
): Fail {
  return fail(
    failure("ambiguous", message, {
      diagnostics: [makeDiagnostic("E0101", { label, value })],
      context: { label, value, candidates },
      recoverable: true,
      suggestions: candidates,
    }),
    meta
  );
}

export function unsupportedConversion(type: string, message: string): Fail {
  return fail(
    failure("unsupported-conversion", message, {
      diagnostics: [makeDiagnostic("E0200", { type })],
      context: { type },
      recoverable: false,
    })
  );
}

export function unknownType(type: string): Fail {
  return fail(
    failure("unknown-type", `unknown value type "${type}"`, {
      diagnostics: [makeDiagnostic("E0201", { type })],
      context: { type },
      recoverable: false,
    })
  );
}

export function malformedTable(detail: string): Fail {
  return fail(
    failure("invariant-violated", `malformed keyword table: ${detail}`, {
      diagnostics: [makeDiagnostic("E0300", { detail })],
      recoverable: false,
    })
  );
}
