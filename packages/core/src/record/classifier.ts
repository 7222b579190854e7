/**
 * Record member classifier
 *
 * Decides which members of a compiled record type the compiler synthesized,
 * so that the emitter can leave them out of the reconstructed declaration.
 * A member is reported as generated only when its signature and body match
 * the synthesized shape exactly; anything else is treated as user code.
 */

import { selfTypeOf } from "../type-system/type-ops.js";
import type { DecompilerTypeSystem } from "../type-system/type-system.js";
import type {
  MethodDefinition,
  PropertyDefinition,
  RecordMember,
  RecordTypeDefinition,
} from "../type-system/types.js";
import {
  createBodyDecompiler,
  createInvariant,
  createRecordTypeTest,
  detectInheritedRecord,
  type RecordAnalysis,
} from "./analysis.js";
import { detectAutomaticProperties } from "./auto-properties.js";
import type { BackingFieldMap } from "./backing-field-map.js";
import { isGeneratedEqualityContract } from "./matchers/equality-contract.js";
import { isGeneratedEquals } from "./matchers/equals.js";
import {
  isGeneratedComparisonOperator,
  isObjectEqualsOverload,
} from "./matchers/operators.js";
import { isGeneratedPrintMembers } from "./matchers/print-members.js";
import { isGeneratedToString } from "./matchers/to-string.js";
import { detectMemberOrder } from "./member-order.js";
import {
  CLONE_METHOD,
  EQUALITY_CONTRACT,
  OP_EQUALITY,
  OP_INEQUALITY,
  PRINT_MEMBERS,
} from "./names.js";

export type ClassifierOptions = {
  /** Aborts construction and any later query */
  readonly signal?: AbortSignal;
  /** Check internal preconditions with node:assert */
  readonly debugAssertions?: boolean;
};

export class RecordClassifier {
  private readonly analysis: RecordAnalysis;

  /**
   * Detects automatic properties and the member order up front.
   * Throws the signal's abort reason if cancelled meanwhile.
   */
  constructor(
    record: RecordTypeDefinition,
    typeSystem: DecompilerTypeSystem,
    options: ClassifierOptions = {}
  ) {
    const { signal, debugAssertions = false } = options;
    signal?.throwIfAborted();

    const selfType = selfTypeOf(record);
    const isRecordType = createRecordTypeTest(selfType);
    const decompileBody = createBodyDecompiler(typeSystem, record, signal);

    const backingFields = detectAutomaticProperties({
      record,
      decompileBody,
      isRecordType,
      signal,
    });

    this.analysis = {
      record,
      selfType,
      typeSystem,
      isInheritedRecord: detectInheritedRecord(record, typeSystem),
      backingFields,
      memberOrder: detectMemberOrder(record, backingFields),
      signal,
      decompileBody,
      isRecordType,
      invariant: createInvariant(debugAssertions),
    };
  }

  get record(): RecordTypeDefinition {
    return this.analysis.record;
  }

  get autoProperties(): BackingFieldMap {
    return this.analysis.backingFields;
  }

  /** Undefined when fields and properties cannot be interleaved safely */
  get memberOrder(): readonly RecordMember[] | undefined {
    return this.analysis.memberOrder;
  }

  get isInheritedRecord(): boolean {
    return this.analysis.isInheritedRecord;
  }

  /**
   * Will the compiler synthesize this method, so it must not be emitted?
   */
  methodIsGenerated(method: MethodDefinition): boolean {
    const { analysis } = this;
    analysis.signal?.throwIfAborted();

    switch (method.name) {
      case OP_EQUALITY:
      case OP_INEQUALITY:
        return isGeneratedComparisonOperator(method, analysis);

      case "Equals":
        if (method.parameters.length !== 1) return false;
        if (isObjectEqualsOverload(method, analysis)) return true;
        return method.parameters.every((p) => analysis.isRecordType(p.type))
          ? isGeneratedEquals(method, analysis)
          : false;

      case CLONE_METHOD:
        return method.parameters.length === 0;

      case PRINT_MEMBERS:
        return isGeneratedPrintMembers(method, analysis);

      case "ToString":
        return (
          method.parameters.length === 0 &&
          isGeneratedToString(method, analysis)
        );

      default:
        return false;
    }
  }

  propertyIsGenerated(property: PropertyDefinition): boolean {
    this.analysis.signal?.throwIfAborted();
    return property.name === EQUALITY_CONTRACT
      ? isGeneratedEqualityContract(property, this.analysis)
      : false;
  }
}
