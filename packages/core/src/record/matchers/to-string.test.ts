/**
 * Tests for the ToString matcher
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as il from "../../il/builders.js";
import {
  appendText,
  bodyVariable,
  COMPILER_GENERATED,
  createRecordFixture,
  editBody,
  OBJECT,
  type RecordFixture,
} from "../../tests/record-fixtures.js";
import { RecordClassifier } from "../classifier.js";

const isGenerated = (fixture: RecordFixture): boolean =>
  new RecordClassifier(fixture.record, fixture.typeSystem).methodIsGenerated(
    fixture.method("ToString")
  );

const builderOf = (fixture: RecordFixture) =>
  bodyVariable(fixture, fixture.method("ToString"), "builder");

describe("ToString matcher", () => {
  it("should accept the compiler's body", () => {
    expect(isGenerated(createRecordFixture())).to.equal(true);
  });

  it("should accept a body without the PrintMembers call", () => {
    const fixture = createRecordFixture({ autoProperties: [] });
    editBody(fixture, fixture.method("ToString"), (insts) => [
      ...insts.slice(0, 3),
      ...insts.slice(4),
    ]);
    expect(isGenerated(fixture)).to.equal(true);
  });

  it("should reject a body that stops after the header", () => {
    const fixture = createRecordFixture();
    editBody(fixture, fixture.method("ToString"), (insts) => insts.slice(0, 3));
    expect(isGenerated(fixture)).to.equal(false);
  });

  it("should reject another type name", () => {
    const fixture = createRecordFixture();
    const builder = builderOf(fixture);
    editBody(fixture, fixture.method("ToString"), (insts) => [
      ...insts.slice(0, 1),
      appendText(builder, "Demo.Point"),
      ...insts.slice(2),
    ]);
    expect(isGenerated(fixture)).to.equal(false);
  });

  it("should reject a different opening brace", () => {
    const fixture = createRecordFixture();
    const builder = builderOf(fixture);
    editBody(fixture, fixture.method("ToString"), (insts) => [
      ...insts.slice(0, 2),
      appendText(builder, "{ "),
      ...insts.slice(3),
    ]);
    expect(isGenerated(fixture)).to.equal(false);
  });

  it("should reject a different separator after the members", () => {
    const fixture = createRecordFixture();
    const toString = fixture.method("ToString");
    const builder = builderOf(fixture);
    const self = bodyVariable(fixture, toString, "this");
    editBody(fixture, toString, (insts) => [
      ...insts.slice(0, 3),
      il.ifInst(
        il.callvirt(
          {
            name: "PrintMembers",
            declaringType: fixture.selfType,
            isStatic: false,
          },
          il.ldloc(self),
          il.ldloc(builder)
        ),
        appendText(builder, ", ")
      ),
      ...insts.slice(4),
    ]);
    expect(isGenerated(fixture)).to.equal(false);
  });

  it("should reject a builder that is not a StringBuilder", () => {
    const fixture = createRecordFixture();
    const builder = builderOf(fixture);
    editBody(fixture, fixture.method("ToString"), (insts) => [
      il.stloc(builder, il.newobj({ name: ".ctor", declaringType: OBJECT, isStatic: false })),
      ...insts.slice(1),
    ]);
    expect(isGenerated(fixture)).to.equal(false);
  });

  it("should reject returning something other than the built string", () => {
    const fixture = createRecordFixture();
    editBody(fixture, fixture.method("ToString"), (insts) => [
      ...insts.slice(0, -1),
      il.ret(il.ldstr("Point { }")),
    ]);
    expect(isGenerated(fixture)).to.equal(false);
  });

  describe("signature", () => {
    const fixture = createRecordFixture();
    const classifier = new RecordClassifier(fixture.record, fixture.typeSystem);
    const toString = fixture.method("ToString");

    it("should require an override", () => {
      expect(
        classifier.methodIsGenerated({ ...toString, isOverride: false, isVirtual: true })
      ).to.equal(false);
    });

    it("should reject a sealed override", () => {
      expect(classifier.methodIsGenerated({ ...toString, isSealed: true })).to.equal(false);
    });

    it("should reject attributes", () => {
      expect(
        classifier.methodIsGenerated({ ...toString, attributes: [COMPILER_GENERATED] })
      ).to.equal(false);
    });

    it("should reject a ToString without a body", () => {
      expect(classifier.methodIsGenerated({ ...toString, hasBody: false })).to.equal(false);
    });
  });
});
