import { assert, test } from "vitest";
import { classify, normalize, registerFrameworkBase } from "../spec/classifier.js";
import { Specification } from "../spec/specification.js";
import type { RunOptions, SpecificationClass } from "../spec/types.js";

export abstract class VitestSpecification extends Specification {
  failContext(): void {
    assert.fail(`Specification failed: ${this.displayName}`);
  }
}

registerFrameworkBase(VitestSpecification);

/**
 * Register a specification class as one Vitest test named after it.
 */
export function verifies(
  type: SpecificationClass,
  options: Pick<RunOptions, "sink"> = {}
): void {
  const { separator } = classify(type);

  test(normalize(type.name, separator), async () => {
    const report = await new type().run({ sink: options.sink, onFailure: () => {} });

    if (report.failures.length > 0) {
      assert.fail(
        report.failures.map((f) => `${f.condition} - FAILED`).join("\n")
      );
    }
  });
}
