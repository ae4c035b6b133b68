import { describe, it, expect } from "vitest";
import { classify, normalize, roleOf, readMarkers } from "../../src/spec/classifier.js";
import { Specification } from "../../src/spec/specification.js";
import { NodeAssertSpecification } from "../../src/adapters/node-assert.js";
import { SpecificationStructureError } from "../../src/spec/errors.js";
import type { DiscoveredMethod } from "../../src/spec/types.js";

const names = (methods: readonly DiscoveredMethod[]) => methods.map((m) => m.name);

class account_specs extends Specification {
  before_each() {}
  given_an_account() {}
  act_deposit() {}
  when_depositing() {}
  it_has_a_balance() {}
  after_all() {}
  helper() {}
  format_amount() {}
  when_given_an_amount(amount: number) {
    return amount;
  }
  get when_read_as_accessor() {
    return 1;
  }
}

class base_context extends Specification {
  given_base() {}
  when_shared() {}
  finally_base() {}
}

class derived_context extends base_context {
  given_derived() {}
  when_shared() {}
  when_derived() {}
  finally_derived() {}
}

class legacy_base extends Specification {
  static ordering = "inherited" as const;
  given_one() {}
  given_two() {}
}

class legacy_derived extends legacy_base {
  given_three() {}
}

class adapter_specs extends NodeAssertSpecification {
  static ordering = "inherited" as const;
  given_a() {}
  given_b() {}
}

class dollar$specs extends Specification {
  static separator = "$";
  when$it$works() {}
  when_underscored() {}
}

class tagged_specs extends Specification {
  static tags = { when_focused: "focus", it_also_focused: "" };
  when_focused() {}
  it_also_focused() {}
  when_ignored() {}
}

class skipped_base extends Specification {
  static skip = true;
  act_from_skipped() {}
}

class reenabled extends skipped_base {
  static skip = false;
  act_here() {}
}

class bad_separator_specs extends Specification {
  static separator = "--";
}

describe("roleOf", () => {
  it("matches each role's prefixes", () => {
    expect(roleOf("before_all", "_")).toBe("arrange");
    expect(roleOf("given_a_user", "_")).toBe("arrange");
    expect(roleOf("arrange_data", "_")).toBe("arrange");
    expect(roleOf("act_now", "_")).toBe("act");
    expect(roleOf("do_it", "_")).toBe("act");
    expect(roleOf("after_all", "_")).toBe("teardown");
    expect(roleOf("finally_close", "_")).toBe("teardown");
    expect(roleOf("when_adding", "_")).toBe("example");
    expect(roleOf("it_adds", "_")).toBe("example");
    expect(roleOf("should_add", "_")).toBe("example");
    expect(roleOf("then_adds", "_")).toBe("example");
    expect(roleOf("assert_sum", "_")).toBe("example");
  });

  it("requires the separator after the prefix", () => {
    expect(roleOf("whenever", "_")).toBeUndefined();
    expect(roleOf("format_amount", "_")).toBeUndefined();
    expect(roleOf("when$adding", "_")).toBeUndefined();
    expect(roleOf("when$adding", "$")).toBe("example");
  });
});

describe("normalize", () => {
  it("replaces every separator with a space", () => {
    expect(normalize("when_adding_two_numbers")).toBe("when adding two numbers");
    expect(normalize("when$adding", "$")).toBe("when adding");
  });
});

describe("classify", () => {
  it("partitions methods into roles", () => {
    const c = classify(account_specs);

    expect(names(c.arrange)).toEqual(["before_each", "given_an_account"]);
    expect(names(c.act)).toEqual(["act_deposit"]);
    expect(names(c.examples)).toEqual(["when_depositing", "it_has_a_balance"]);
    expect(names(c.teardown)).toEqual(["after_all"]);
  });

  it("ignores methods with parameters and accessors", () => {
    const c = classify(account_specs);

    expect(names(c.examples)).not.toContain("when_given_an_amount");
    expect(names(c.examples)).not.toContain("when_read_as_accessor");
  });

  it("caches the classification per class", () => {
    expect(classify(account_specs)).toBe(classify(account_specs));
    expect(new account_specs().classification).toBe(classify(account_specs));
  });

  it("puts ancestor declarations first by default", () => {
    const c = classify(derived_context);

    expect(c.ordering).toBe("declaration");
    expect(names(c.arrange)).toEqual(["given_base", "given_derived"]);
    expect(names(c.teardown)).toEqual(["finally_base", "finally_derived"]);
  });

  it("lets an override hide the ancestor method", () => {
    const c = classify(derived_context);
    const shared = c.examples.filter((m) => m.name === "when_shared");

    expect(names(c.examples)).toEqual(["when_shared", "when_derived"]);
    expect(shared).toHaveLength(1);
    expect(shared[0].declaringType).toBe(derived_context);
  });

  it("keeps discovery order one level below the base under inherited ordering", () => {
    expect(names(classify(legacy_base).arrange)).toEqual(["given_one", "given_two"]);
  });

  it("reverses buckets deeper in the chain under inherited ordering", () => {
    expect(names(classify(legacy_derived).arrange)).toEqual([
      "given_two",
      "given_one",
      "given_three",
    ]);
  });

  it("reverses buckets below an adapter under inherited ordering", () => {
    expect(names(classify(adapter_specs).arrange)).toEqual(["given_b", "given_a"]);
  });

  it("still stops discovery at an adapter", () => {
    expect(classify(adapter_specs).arrange.map((m) => m.declaringType)).toEqual([
      adapter_specs,
      adapter_specs,
    ]);
  });

  it("honors a custom separator", () => {
    const c = classify(dollar$specs);

    expect(c.separator).toBe("$");
    expect(names(c.examples)).toEqual(["when$it$works"]);
  });

  it("keeps only tagged examples when any are tagged", () => {
    const c = classify(tagged_specs);

    expect(names(c.examples)).toEqual(["when_focused", "it_also_focused"]);
    expect(c.tags.get("when_focused")).toBe("focus");
    expect(c.tags.get("it_also_focused")).toBe("");
    expect(c.tags.has("when_ignored")).toBe(false);
  });

  it("drops act methods declared on a skipped class", () => {
    const c = classify(reenabled);

    expect(c.skipped).toBe(false);
    expect(names(c.act)).toEqual(["act_here"]);
  });

  it("rejects invalid markers", () => {
    expect(() => classify(bad_separator_specs)).toThrow(SpecificationStructureError);
    expect(() => readMarkers(bad_separator_specs)).toThrow(
      "Specification 'bad_separator_specs' declares invalid markers (separator: separator must be a single character)."
    );
  });
});
