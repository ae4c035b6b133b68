import { AssertionError } from "node:assert";
import { registerFrameworkBase } from "../spec/classifier.js";
import { Specification } from "../spec/specification.js";

/**
 * Signals failure with `node:assert`'s AssertionError, which node:test,
 * Mocha, Jest and Vitest all report as a failed assertion.
 */
export abstract class NodeAssertSpecification extends Specification {
  failContext(): void {
    throw new AssertionError({
      message: `Specification failed: ${this.displayName}`,
    });
  }
}

registerFrameworkBase(NodeAssertSpecification);
