import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Interp } from "../../src/core/interp/interp";
import { Obj } from "../../src/core/obj/obj";
import { DEFAULT_CONFIG, mergeConfigs } from "../../src/core/config/config";
import {
  applyLookupConfig,
  clearLookupLog,
  configureLookupLog,
  getLookupStats,
  getRecentEvents,
} from "../../src/core/lookup/events";

const SUBCOMMANDS = ["start", "status", "stop"];

describe("Interp", () => {
  let interp: Interp;

  beforeEach(() => {
    clearLookupLog();
    interp = new Interp();
  });

  afterEach(() => {
    configureLookupLog({ limit: 1000, enabled: true });
  });

  describe("getIndex", () => {
    it("returns the index and leaves the result alone on success", () => {
      interp.setResult("previous");
      expect(interp.getIndex(Obj.fromString("sto"), SUBCOMMANDS, "subcommand")).toBe(2);
      expect(interp.result).toBe("previous");
    });

    it("leaves the error text in the result on failure", () => {
      expect(interp.getIndex(Obj.fromString("st"), SUBCOMMANDS, "subcommand")).toBeUndefined();
      expect(interp.result).toBe('ambiguous subcommand "st": must be start, status, or stop');
    });

    it("looks up keywords embedded in records", () => {
      const table = ["-all", 1, "-nocase", 2, null, null];
      expect(interp.getIndexStruct(Obj.fromString("-n"), table, 2, "switch")).toBe(1);
    });

    it("uses the configured exactness unless the call overrides it", () => {
      const strict = new Interp(mergeConfigs(DEFAULT_CONFIG, { lookup: { exactByDefault: true } }));
      const obj = Obj.fromString("sto");

      expect(strict.getIndex(obj, SUBCOMMANDS, "subcommand")).toBeUndefined();
      expect(strict.result).toBe('bad subcommand "sto": must be start, status, or stop');
      expect(strict.getIndex(obj, SUBCOMMANDS, "subcommand", { exact: false })).toBe(2);
    });

    it("leaves the shared ledger settings alone when constructed", () => {
      new Interp(mergeConfigs(DEFAULT_CONFIG, { lookup: { logEnabled: false, logLimit: 0 } }));
      interp.getIndex(Obj.fromString("stop"), SUBCOMMANDS, "subcommand");
      expect(getRecentEvents()).toHaveLength(1);
      expect(getLookupStats().scans).toBe(1);
    });

    it("logs according to the config applied at startup", () => {
      applyLookupConfig(mergeConfigs(DEFAULT_CONFIG, { lookup: { logEnabled: false } }).lookup);
      interp.getIndex(Obj.fromString("stop"), SUBCOMMANDS, "subcommand");
      expect(getRecentEvents()).toEqual([]);
      expect(getLookupStats().scans).toBe(1);
    });
  });

  describe("wrongNumArgs", () => {
    it("prints the first objc words", () => {
      interp.wrongNumArgs(1, [Obj.fromString("incr"), Obj.fromString("x"), Obj.fromString("y")], "varName ?increment?");
      expect(interp.result).toBe('wrong # args: should be "incr varName ?increment?"');
    });

    it("prints no words for a negative count", () => {
      interp.wrongNumArgs(-1, [Obj.fromString("incr"), Obj.fromString("x")], "varName");
      expect(interp.result).toBe('wrong # args: should be "varName"');
    });

    it("prints resolved subcommands in full", () => {
      const sub = Obj.fromString("sta");
      const objv = [Obj.fromString("service"), sub];
      interp.getIndex(sub, SUBCOMMANDS, "subcommand");
      expect(interp.result).toBe('ambiguous subcommand "sta": must be start, status, or stop');

      const exact = Obj.fromString("start");
      interp.getIndex(exact, SUBCOMMANDS, "subcommand");
      interp.wrongNumArgs(2, [objv[0], exact], "name");
      expect(interp.result).toBe('wrong # args: should be "service start name"');
    });

    it("collects alternatives into one message", () => {
      const objv = [Obj.fromString("after")];
      interp.wrongNumArgs(1, objv, "ms");
      interp.withAlternateWrongArgs(() => {
        interp.wrongNumArgs(1, objv, "cancel id");
      });
      expect(interp.result).toBe('wrong # args: should be "after ms" or "after cancel id"');
      expect(interp.alternateWrongArgs).toBe(false);
    });

    it("reports in terms of the ensemble's words while a rewrite is active", () => {
      const rewrite = {
        sourceObjs: [Obj.fromString("dict"), Obj.fromString("get")],
        numRemovedObjs: 2,
        numInsertedObjs: 1,
      };
      const objv = [Obj.fromString("::dict::get")];

      interp.withEnsembleRewrite(rewrite, () => {
        interp.wrongNumArgs(1, objv, "dictionary ?key ...?");
      });
      expect(interp.result).toBe('wrong # args: should be "dict get dictionary ?key ...?"');
      expect(interp.ensembleRewrite).toBeUndefined();

      interp.wrongNumArgs(1, objv);
      expect(interp.result).toBe('wrong # args: should be "::dict::get"');
    });

    it("restores the rewrite when the callback throws", () => {
      const rewrite = { sourceObjs: [], numRemovedObjs: 0, numInsertedObjs: 0 };
      expect(() =>
        interp.withEnsembleRewrite(rewrite, () => {
          throw new Error("boom");
        })
      ).toThrow("boom");
      expect(interp.ensembleRewrite).toBeUndefined();
    });

    it("honours literalFirstWord from config", () => {
      const literal = new Interp(mergeConfigs(DEFAULT_CONFIG, { usage: { literalFirstWord: true } }));
      literal.wrongNumArgs(2, [Obj.fromString("my cmd"), Obj.fromString("a b")]);
      expect(literal.result).toBe('wrong # args: should be "my cmd {a b}"');
    });
  });

  it("resets the result", () => {
    interp.setResult("x");
    interp.resetResult();
    expect(interp.result).toBe("");
  });
});
