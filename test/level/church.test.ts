import { assert } from "chai";
import { describe, it } from "mocha";

import {
  churchBoolean,
  churchNumeral,
  unChurchBoolean,
  unChurchNumeral,
} from "../../lib/level/church.ts";
import { prettyPrint } from "../../lib/level/prettyPrint.ts";
import { mkApp, mkFunc, mkVar } from "../../lib/level/term.ts";
import { TermError } from "../../lib/level/termError.ts";

describe("churchNumeral", () => {
  it("encodes zero as λf.λx.x", () => {
    assert.strictEqual(prettyPrint(churchNumeral(0)), "λ.(λ.(1))");
  });

  it("applies f n times", () => {
    assert.deepStrictEqual(
      churchNumeral(1),
      mkFunc(mkFunc(mkApp(mkVar(0), mkVar(1)))),
    );
    assert.strictEqual(
      prettyPrint(churchNumeral(3)),
      "λ.(λ.((0 (0 (0 1)))))",
    );
  });

  it("binds levels from the given depth", () => {
    assert.strictEqual(prettyPrint(churchNumeral(2, 4)), "λ.(λ.((4 (4 5))))");
  });

  it("only represents non-negative integers", () => {
    assert.throws(() => churchNumeral(-1), TermError);
    assert.throws(() => churchNumeral(0.5), TermError);
  });
});

describe("unChurchNumeral", () => {
  it("decodes what churchNumeral encodes", () => {
    for (const n of [0, 1, 2, 7, 25]) {
      assert.strictEqual(unChurchNumeral(churchNumeral(n)), n);
      assert.strictEqual(unChurchNumeral(churchNumeral(n, 3), 3), n);
    }
  });

  it("rejects terms that are not numerals", () => {
    assert.isUndefined(unChurchNumeral(mkVar(0)));
    assert.isUndefined(unChurchNumeral(mkFunc(mkVar(0))));
    // λf.λx.f
    assert.isUndefined(unChurchNumeral(mkFunc(mkFunc(mkVar(0)))));
    // λf.λx.x (f x)
    assert.isUndefined(
      unChurchNumeral(mkFunc(mkFunc(mkApp(mkVar(1), mkApp(mkVar(0), mkVar(1)))))),
    );
  });

  it("depends on the depth the numeral sits at", () => {
    assert.isUndefined(unChurchNumeral(churchNumeral(2), 1));
  });
});

describe("Church booleans", () => {
  it("encodes true as the first of two arguments", () => {
    assert.strictEqual(prettyPrint(churchBoolean(true)), "λ.(λ.(0))");
    assert.strictEqual(prettyPrint(churchBoolean(false)), "λ.(λ.(1))");
  });

  it("decodes both values", () => {
    assert.isTrue(unChurchBoolean(churchBoolean(true)));
    assert.isFalse(unChurchBoolean(churchBoolean(false)));
    assert.isTrue(unChurchBoolean(churchBoolean(true, 2), 2));
    assert.isFalse(unChurchBoolean(churchBoolean(false, 2), 2));
  });

  it("rejects other terms", () => {
    assert.isUndefined(unChurchBoolean(mkFunc(mkFunc(mkVar(2)))));
    assert.isUndefined(unChurchBoolean(churchNumeral(1)));
    assert.isUndefined(unChurchBoolean(mkFunc(mkVar(0))));
  });
});
