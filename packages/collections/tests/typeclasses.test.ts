import { describe, it, expect } from "vitest";
import {
  combineHashes,
  eqBy,
  hashNumber,
  hashString,
  keyedBy,
  numberKey,
  optional,
  ordBy,
  ordNumber,
  ordString,
  stringKey,
} from "../src/index.js";

describe("Typeclass instances", () => {
  describe("primitive instances", () => {
    it("stringKey compares, hashes and shows strings", () => {
      expect(stringKey.equals("a", "a")).toBe(true);
      expect(stringKey.notEquals("a", "b")).toBe(true);
      expect(stringKey.hash("abc")).toBe(hashString.hash("abc"));
      expect(stringKey.show("Idle")).toBe("Idle");
    });

    it("numberKey shows numbers without decoration", () => {
      expect(numberKey.show(42)).toBe("42");
      expect(numberKey.hash(7)).toBe(7);
    });

    it("hashNumber folds non-integers through the string hash", () => {
      expect(hashNumber.hash(1.5)).toBe(hashString.hash("1.5"));
    });

    it("ordString and ordNumber", () => {
      expect(ordString.compare("a", "b")).toBe(-1);
      expect(ordString.compare("b", "a")).toBe(1);
      expect(ordNumber.compare(3, 3)).toBe(0);
    });
  });

  describe("combinators", () => {
    interface Tagged {
      tag: string;
      extra: number;
    }

    it("eqBy compares by projection", () => {
      const eq = eqBy((t: Tagged) => t.tag);
      expect(eq.equals({ tag: "x", extra: 1 }, { tag: "x", extra: 2 })).toBe(true);
      expect(eq.equals({ tag: "x", extra: 1 }, { tag: "y", extra: 1 })).toBe(false);
    });

    it("keyedBy delegates all three instances", () => {
      const K = keyedBy((t: Tagged) => t.tag, stringKey);
      expect(K.show({ tag: "go", extra: 0 })).toBe("go");
      expect(K.hash({ tag: "go", extra: 0 })).toBe(stringKey.hash("go"));
    });

    it("ordBy orders by projection", () => {
      const O = ordBy((t: Tagged) => t.extra, ordNumber);
      expect(O.compare({ tag: "a", extra: 1 }, { tag: "b", extra: 2 })).toBe(-1);
    });

    it("combineHashes is order sensitive", () => {
      expect(combineHashes([1, 2])).not.toBe(combineHashes([2, 1]));
    });
  });

  describe("optional", () => {
    const K = optional(stringKey);

    it("treats undefined as equal only to itself", () => {
      expect(K.equals(undefined, undefined)).toBe(true);
      expect(K.equals(undefined, "a")).toBe(false);
      expect(K.equals("a", undefined)).toBe(false);
      expect(K.equals("a", "a")).toBe(true);
    });

    it("shows undefined as an empty string", () => {
      expect(K.show(undefined)).toBe("");
      expect(K.show("A")).toBe("A");
    });

    it("hashes present values like the inner instance", () => {
      expect(K.hash("A")).toBe(stringKey.hash("A"));
    });
  });
});
