import { describe, it, expect } from "vitest";
import {
  DECLINED,
  FALSE,
  NIL,
  ObjectType,
  TRUE,
  VelaArray,
  VelaEnum,
  VelaNativeEnum,
  VelaNativeIterator,
  VelaNumber,
  VelaPath,
  VelaString,
  VelaTag,
  valuesEqual,
} from "./object.js";
import { VMError } from "../vm/errors.js";

const num = (value: number) => new VelaNumber(value);
const str = (value: string) => new VelaString(value);

describe("values", () => {
  describe("display", () => {
    it("should display scalars", () => {
      expect(num(3).toString()).toBe("3");
      expect(num(2.5).inspect()).toBe("2.5");
      expect(TRUE.toString()).toBe("true");
      expect(NIL.toString()).toBe("void");
    });

    it("should quote strings and paths only when inspected", () => {
      expect(str("hi").inspect()).toBe('"hi"');
      expect(str("hi").toString()).toBe("hi");
      expect(new VelaPath("a/b").inspect()).toBe("'a/b'");
      expect(new VelaPath("a/b").toString()).toBe("a/b");
    });

    it("should display arrays and tags", () => {
      expect(new VelaArray([num(1), str("a")]).toString()).toBe('[1, "a"]');
      expect(new VelaTag(ObjectType.Correction, "drift").toString()).toBe("drift");
    });
  });

  describe("truthiness", () => {
    it("should follow each kind's emptiness", () => {
      expect(NIL.isTruthy()).toBe(false);
      expect(num(0).isTruthy()).toBe(false);
      expect(num(-1).isTruthy()).toBe(true);
      expect(str("").isTruthy()).toBe(false);
      expect(new VelaArray([]).isTruthy()).toBe(false);
    });
  });

  describe("operators", () => {
    it("should add numbers and concatenate strings", () => {
      expect(num(1).add(num(2))).toEqual(num(3));
      expect(str("a").add(str("b"))).toEqual(str("ab"));
    });

    it("should decline mismatched operands", () => {
      expect(num(1).add(str("a"))).toBe(DECLINED);
      expect(str("a").add(num(1))).toBe(DECLINED);
      expect(num(1).rAdd(str("a"))).toBe(DECLINED);
      expect(str("a").negate()).toBe(DECLINED);
      expect(num(1).invert()).toBe(DECLINED);
    });

    it("should shift by powers of ten", () => {
      expect(num(2).power(num(3))).toEqual(num(2000));
      expect(num(5).power(num(-1))).toEqual(num(0.5));
      expect(num(2).power(num(0.5))).toBe(DECLINED);
    });

    it("should mix numbers bitwise", () => {
      expect(num(5).mix(num(2))).toEqual(num(7));
      expect(num(0xffffffff).mix(num(0))).toEqual(num(4294967295));
      expect(num(3000000000).mix(num(1))).toEqual(num(3000000001));
    });

    it("should decline mixing fractions", () => {
      expect(num(1.5).mix(num(1))).toBe(DECLINED);
      expect(num(1).mix(num(0.5))).toBe(DECLINED);
    });

    it("should reject shifts that overflow", () => {
      expect(() => num(1).power(num(400))).toThrow("1 ^ 400 is out of range");
    });

    it("should compare numbers", () => {
      expect(num(1).less(num(2))).toBe(TRUE);
      expect(num(1).more(num(2))).toBe(FALSE);
    });

    it("should invert booleans", () => {
      expect(TRUE.invert()).toBe(FALSE);
    });

    it("should reverse and concatenate arrays", () => {
      const array = new VelaArray([num(1), num(2)]);
      expect(array.invert()).toEqual(new VelaArray([num(2), num(1)]));
      expect(array.mix(new VelaArray([num(3)]))).toEqual(new VelaArray([num(1), num(2), num(3)]));
      expect(array.elements).toHaveLength(2);
    });
  });

  describe("equality", () => {
    it("should compare like kinds", () => {
      expect(valuesEqual(num(1), num(1))).toBe(true);
      expect(valuesEqual(str("a"), str("b"))).toBe(false);
      expect(valuesEqual(new VelaPath("p"), new VelaPath("p"))).toBe(true);
    });

    it("should equate booleans with 0 and 1", () => {
      expect(valuesEqual(TRUE, num(1))).toBe(true);
      expect(valuesEqual(num(0), FALSE)).toBe(true);
    });

    it("should treat void as equal only to void", () => {
      expect(valuesEqual(NIL, NIL)).toBe(true);
      expect(valuesEqual(NIL, num(0))).toBe(false);
      expect(valuesEqual(num(0), NIL)).toBe(false);
    });

    it("should compare arrays element by element", () => {
      const a = new VelaArray([num(1), str("x")]);
      expect(valuesEqual(a, new VelaArray([num(1), str("x")]))).toBe(true);
      expect(valuesEqual(a, new VelaArray([num(1)]))).toBe(false);
    });

    it("should distinguish tags of different kinds", () => {
      const drift = new VelaTag(ObjectType.Correction, "drift");
      expect(valuesEqual(drift, new VelaTag(ObjectType.Correction, "drift"))).toBe(true);
      expect(valuesEqual(drift, new VelaTag(ObjectType.Algorithm, "drift"))).toBe(false);
    });

    it("should leave unrelated kinds unequal", () => {
      expect(num(1).equal(str("1"))).toBe(DECLINED);
      expect(valuesEqual(num(1), str("1"))).toBe(false);
    });
  });

  describe("enumerations", () => {
    it("should number members in declaration order", () => {
      const colors = new VelaEnum("Color");
      colors.addMember("Red");
      colors.addMember("Green");
      expect(colors.getField("Green")).toEqual(num(1));
      expect(colors.getField("Blue")).toBeUndefined();
      expect(colors.inspect()).toBe("<enum Color>");
    });

    it("should reject duplicate members", () => {
      const colors = new VelaEnum("Color");
      colors.addMember("Red");
      expect(() => colors.addMember("Red")).toThrow(VMError);
    });

    it("should mirror host enumerations", () => {
      const modes = new VelaNativeEnum("Mode", { Fast: 4, Slow: 9 });
      expect(modes.getField("Slow")).toEqual(num(9));
      expect(modes.getField("Idle")).toBeUndefined();
    });
  });

  describe("native iterators", () => {
    it("should yield items then undefined", () => {
      const items = new VelaNativeIterator([num(1)]);
      expect(items.next()).toEqual(num(1));
      expect(items.next()).toBeUndefined();
      expect(items.next()).toBeUndefined();
    });
  });
});
