/**
 * Tests for instruction patterns
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as il from "./builders.js";
import {
  isCallInstruction,
  isLdLoc,
  matchCompNotEqualsNull,
  matchIfInstruction,
  matchLdcI4,
  matchLdThis,
  matchReturn,
  unwrapBlock,
} from "./patterns.js";

const INT32 = { kind: "named", namespace: "System", name: "Int32", typeArguments: [] } as const;
const self = il.thisParameter({ kind: "named", namespace: "Demo", name: "Point", typeArguments: [] });
const value = il.variable("parameter", 0, "value", INT32);

describe("Instruction patterns", () => {
  it("should match a return only when leaving the function body", () => {
    expect(matchReturn(il.ret(il.ldcI4(1)))).to.deep.equal(il.ldcI4(1));
    expect(matchReturn(il.leave("nested", il.ldcI4(1)))).to.equal(undefined);
    expect(matchReturn(undefined)).to.equal(undefined);
  });

  it("should return nop for a void return", () => {
    expect(matchReturn(il.ret())).to.deep.equal(il.nop());
  });

  it("should recognize this by parameter index", () => {
    expect(matchLdThis(il.ldloc(self))).to.equal(true);
    expect(matchLdThis(il.ldloc(value))).to.equal(false);
  });

  it("should compare variables by identity", () => {
    const lookalike = il.variable("parameter", 0, "value", INT32);
    expect(isLdLoc(il.ldloc(value), value)).to.equal(true);
    expect(isLdLoc(il.ldloc(lookalike), value)).to.equal(false);
  });

  it("should match integer constants by value", () => {
    expect(matchLdcI4(il.ldcI4(1), 1)).to.equal(true);
    expect(matchLdcI4(il.ldcI4(1), 0)).to.equal(false);
    expect(matchLdcI4(il.ldstr("1"), 1)).to.equal(false);
  });

  it("should match an if without else", () => {
    const inst = il.ifInst(il.ldloc(value), il.nop());
    expect(matchIfInstruction(inst)).to.deep.equal({
      condition: il.ldloc(value),
      trueInst: il.nop(),
    });
    expect(matchIfInstruction(il.ifInst(il.ldloc(value), il.nop(), il.ret()))).to.equal(undefined);
  });

  it("should match only != null comparisons", () => {
    expect(matchCompNotEqualsNull(il.comp("!=", il.ldloc(value), il.ldnull()))).to.deep.equal(
      il.ldloc(value)
    );
    expect(matchCompNotEqualsNull(il.comp("==", il.ldloc(value), il.ldnull()))).to.equal(undefined);
    expect(matchCompNotEqualsNull(il.comp("!=", il.ldnull(), il.ldloc(value)))).to.equal(undefined);
  });

  it("should treat all three call forms as calls", () => {
    const method = { name: "M", declaringType: INT32, isStatic: true };
    expect(isCallInstruction(il.call(method))).to.equal(true);
    expect(isCallInstruction(il.callvirt(method))).to.equal(true);
    expect(isCallInstruction(il.newobj(method))).to.equal(true);
    expect(isCallInstruction(il.ldnull())).to.equal(false);
  });

  it("should unwrap single-instruction blocks only", () => {
    const inner = il.ldstr(" ");
    expect(unwrapBlock(il.block(inner))).to.equal(inner);
    const pair = il.block(inner, il.nop());
    expect(unwrapBlock(pair)).to.equal(pair);
  });
});
