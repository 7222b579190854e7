/**
 * Tests for per-record analysis helpers
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createRecordFixture, OBJECT } from "../tests/record-fixtures.js";
import {
  createBodyDecompiler,
  createInvariant,
  createRecordTypeTest,
  detectInheritedRecord,
} from "./analysis.js";

describe("Record analysis", () => {
  describe("detectInheritedRecord", () => {
    it("should treat a missing base and System.Object as no base", () => {
      const root = createRecordFixture();
      const objectBased = createRecordFixture({ baseType: OBJECT });

      expect(detectInheritedRecord(root.record, root.typeSystem)).to.equal(false);
      expect(detectInheritedRecord(objectBased.record, objectBased.typeSystem)).to.equal(
        false
      );
    });

    it("should detect a record base", () => {
      const fixture = createRecordFixture({
        baseType: { kind: "named", namespace: "Demo", name: "Shape", typeArguments: [] },
      });
      expect(detectInheritedRecord(fixture.record, fixture.typeSystem)).to.equal(true);
    });
  });

  describe("createRecordTypeTest", () => {
    const fixture = createRecordFixture();
    const isRecordType = createRecordTypeTest(fixture.selfType);

    it("should ignore the nullability annotation", () => {
      expect(isRecordType({ ...fixture.selfType, nullable: true })).to.equal(true);
    });

    it("should reject other types", () => {
      expect(isRecordType(OBJECT)).to.equal(false);
      expect(
        isRecordType({ kind: "named", namespace: "Other", name: "Point", typeArguments: [] })
      ).to.equal(false);
    });
  });

  describe("createBodyDecompiler", () => {
    it("should not ask for bodiless or nil-token methods", () => {
      const fixture = createRecordFixture();
      const decompile = createBodyDecompiler(fixture.typeSystem, fixture.record, undefined);

      expect(decompile(undefined)).to.equal(undefined);
      expect(decompile(fixture.method("<Clone>$"))).to.equal(undefined);
      expect(decompile({ ...fixture.method("get_X"), token: 0 })).to.equal(undefined);
      expect(fixture.decompileCount()).to.equal(0);
    });

    it("should hand out the body of a method", () => {
      const fixture = createRecordFixture();
      const decompile = createBodyDecompiler(fixture.typeSystem, fixture.record, undefined);
      const getX = fixture.method("get_X");

      expect(decompile(getX)).to.equal(fixture.bodies.get(getX.token));
      expect(fixture.decompileCount()).to.equal(1);
    });
  });

  describe("createInvariant", () => {
    it("should throw only when enabled", () => {
      expect(() => createInvariant(false)(false, "broken")).not.to.throw();
      expect(() => createInvariant(true)(false, "broken")).to.throw("broken");
      expect(() => createInvariant(true)(true, "broken")).not.to.throw();
    });
  });
});
