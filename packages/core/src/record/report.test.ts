/**
 * Tests for record reports
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createRecordFixture } from "../tests/record-fixtures.js";
import {
  classifyRecord,
  formatReport,
  methodSignature,
  propertySignature,
  qualifiedRecordName,
  type RecordReport,
} from "./report.js";

describe("Record report", () => {
  describe("signatures", () => {
    const fixture = createRecordFixture();

    it("should print property accessors", () => {
      expect(propertySignature(fixture.property("X"))).to.equal(
        "System.Int32 X { get; set; }"
      );
      expect(propertySignature(fixture.property("EqualityContract"))).to.equal(
        "System.Type EqualityContract { get; }"
      );
    });

    it("should print static methods with parameter types", () => {
      expect(methodSignature(fixture.method("op_Equality"))).to.equal(
        "static System.Boolean op_Equality(Demo.Point?, Demo.Point?)"
      );
      expect(methodSignature(fixture.method("set_X"))).to.equal(
        "System.Void set_X(System.Int32)"
      );
    });

    it("should name generic records with their type parameters", () => {
      expect(
        qualifiedRecordName({ ...fixture.record, name: "Box", typeParameters: ["T"] })
      ).to.equal("Demo.Box<T>");
      expect(qualifiedRecordName({ ...fixture.record, namespace: "" })).to.equal("Point");
    });
  });

  describe("classifyRecord", () => {
    it("should report every property before every method", () => {
      const fixture = createRecordFixture();
      const report = classifyRecord(fixture.record, fixture.typeSystem);

      expect(report.record).to.equal("Demo.Point");
      expect(report.isInheritedRecord).to.equal(false);
      expect(report.autoProperties).to.deep.equal([
        { property: "X", backingField: "<X>k__BackingField" },
        { property: "Y", backingField: "<Y>k__BackingField" },
      ]);
      expect(report.memberOrder).to.deep.equal(["EqualityContract", "X", "Y"]);
      expect(report.members.map((m) => m.name).slice(0, 4)).to.deep.equal([
        "EqualityContract",
        "X",
        "Y",
        "get_EqualityContract",
      ]);
    });

    it("should report a null member order when it is unknown", () => {
      const fixture = createRecordFixture({ manualFields: ["Tag"] });
      expect(classifyRecord(fixture.record, fixture.typeSystem).memberOrder).to.equal(null);
    });
  });

  describe("formatReport", () => {
    const report: RecordReport = {
      record: "Demo.Shape",
      isInheritedRecord: true,
      autoProperties: [],
      memberOrder: null,
      members: [
        { kind: "method", name: "ToString", signature: "System.String ToString()", generated: true },
        { kind: "method", name: "Area", signature: "System.Int32 Area()", generated: false },
      ],
    };

    it("should align generated and user members", () => {
      expect(formatReport(report)).to.equal(
        [
          "record Demo.Shape",
          "  inherited: yes",
          "  auto-properties: (none)",
          "  member order: (unknown)",
          "  [generated] System.String ToString()",
          "  [user]      System.Int32 Area()",
        ].join("\n")
      );
    });

    it("should list only generated members on request", () => {
      expect(formatReport({ ...report, memberOrder: [] }, true)).to.equal(
        [
          "record Demo.Shape",
          "  inherited: yes",
          "  auto-properties: (none)",
          "  member order: (empty)",
          "  [generated] System.String ToString()",
        ].join("\n")
      );
    });

    it("should render a positional record in full", () => {
      const fixture = createRecordFixture();
      const text = formatReport(classifyRecord(fixture.record, fixture.typeSystem), true);

      expect(text.split("\n")).to.deep.equal([
        "record Demo.Point",
        "  auto-properties: X <- <X>k__BackingField, Y <- <Y>k__BackingField",
        "  member order: EqualityContract, X, Y",
        "  [generated] System.Type EqualityContract { get; }",
        "  [generated] System.Boolean PrintMembers(System.Text.StringBuilder)",
        "  [generated] System.String ToString()",
        "  [generated] static System.Boolean op_Inequality(Demo.Point?, Demo.Point?)",
        "  [generated] static System.Boolean op_Equality(Demo.Point?, Demo.Point?)",
        "  [generated] System.Boolean Equals(System.Object?)",
        "  [generated] System.Boolean Equals(Demo.Point?)",
        "  [generated] Demo.Point <Clone>$()",
      ]);
    });
  });
});
