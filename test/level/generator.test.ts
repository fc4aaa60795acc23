import { assert } from "chai";
import { describe, it } from "mocha";
import rsexport, { type RandomSeed } from "random-seed";

import { randLevelTerm } from "../../lib/level/generator.ts";
import { equivalent, type LevelTerm } from "../../lib/level/term.ts";
import { TermError } from "../../lib/level/termError.ts";
import { assertSizes } from "../util/sizes.ts";
const { create } = rsexport;

const maxFreeLevel = (term: LevelTerm, depth: number): number => {
  switch (term.kind) {
    case "level-var":
      return term.index >= depth ? term.index : -1;
    case "level-func":
      return maxFreeLevel(term.body, depth + 1);
    case "non-terminal":
      return Math.max(
        maxFreeLevel(term.lft, depth),
        maxFreeLevel(term.rgt, depth),
      );
  }
};

const inScope = (term: LevelTerm, scope: number): boolean => {
  switch (term.kind) {
    case "level-var":
      return term.index < scope;
    case "level-func":
      return inScope(term.body, scope + 1);
    case "non-terminal":
      return inScope(term.lft, scope) && inScope(term.rgt, scope);
  }
};

describe("randLevelTerm", () => {
  const testSeed = "18477814418";

  it("generates a term with the specified size", () => {
    const rs: RandomSeed = create(testSeed);
    for (let n = 2; n < 30; n++) {
      const generated = randLevelTerm(rs, n);
      assert.strictEqual(generated.size, n);
      assertSizes(generated);
    }
  });

  it("generates closed terms by default", () => {
    const rs: RandomSeed = create(testSeed);
    for (let i = 0; i < 50; i++) {
      assert.strictEqual(maxFreeLevel(randLevelTerm(rs, 25), 0), -1);
    }
  });

  it("only uses levels in scope when free levels are allowed", () => {
    const rs: RandomSeed = create(testSeed);
    for (let i = 0; i < 50; i++) {
      const generated = randLevelTerm(rs, 25, 3);
      assert.isTrue(inScope(generated, 3));
    }
  });

  it("is reproducible from a seed", () => {
    const first = randLevelTerm(create(testSeed), 40);
    const second = randLevelTerm(create(testSeed), 40);
    assert.isTrue(equivalent(first, second));
  });

  it("rejects sizes that cannot be built", () => {
    const rs: RandomSeed = create(testSeed);
    assert.throws(() => randLevelTerm(rs, 0), TermError);
    assert.throws(() => randLevelTerm(rs, 1), TermError);
    assert.deepStrictEqual(randLevelTerm(rs, 1, 1), {
      kind: "level-var",
      index: 0,
      size: 1,
    });
  });
});
