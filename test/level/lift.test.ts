import { assert } from "chai";
import { describe, it } from "mocha";
import rsexport, { type RandomSeed } from "random-seed";

import { randLevelTerm } from "../../lib/level/generator.ts";
import { clone, lift } from "../../lib/level/lift.ts";
import {
  equivalent,
  type LevelTerm,
  mkApp,
  mkFunc,
  mkVar,
} from "../../lib/level/term.ts";
import { assertSizes } from "../util/sizes.ts";
const { create } = rsexport;

describe("lift", () => {
  describe("variables", () => {
    const cases: [number, number, number, number][] = [
      // index, amount, cutoff, expected
      [0, 1, 0, 1],
      [1, 1, 0, 2],
      [1, 0, 0, 1],
      [0, 1, 1, 0],
      [1, 2, 1, 3],
      [1, 2, 2, 1],
      [3, 5, 3, 8],
      [4, 3, 5, 4],
      [7, 10, 3, 17],
      [2, 4, 10, 2],
    ];

    for (const [index, amount, cutoff, expected] of cases) {
      it(`lifts ${index} by ${amount} above ${cutoff} to ${expected}`, () => {
        assert.deepStrictEqual(lift(mkVar(index), amount, cutoff), mkVar(expected));
      });
    }
  });

  it("keeps the cutoff when entering an abstraction", () => {
    // λ.0 lifted by 1 above 0: the bound 0 moves too
    assert.deepStrictEqual(lift(mkFunc(mkVar(0)), 1, 0), mkFunc(mkVar(1)));
    // λ.0 lifted by 1 above 1: 0 is below the cutoff
    assert.deepStrictEqual(lift(mkFunc(mkVar(0)), 1, 1), mkFunc(mkVar(0)));
    assert.deepStrictEqual(lift(mkFunc(mkVar(2)), 2, 2), mkFunc(mkVar(4)));
  });

  it("lifts mixed levels inside an abstraction", () => {
    const term = mkFunc(mkApp(mkApp(mkVar(2), mkVar(5)), mkVar(8)));
    assert.deepStrictEqual(
      lift(term, 3, 5),
      mkFunc(mkApp(mkApp(mkVar(2), mkVar(8)), mkVar(11))),
    );
  });

  it("lifts both sides of an application", () => {
    const term = mkApp(mkFunc(mkVar(1)), mkApp(mkVar(0), mkVar(3)));
    assert.deepStrictEqual(
      lift(term, 2, 1),
      mkApp(mkFunc(mkVar(3)), mkApp(mkVar(0), mkVar(5))),
    );
  });

  it("is the identity when the amount is zero", () => {
    const rs: RandomSeed = create("lift-identity");
    for (let i = 0; i < 50; i++) {
      const term = randLevelTerm(rs, rs.intBetween(1, 40), 3);
      const cutoff = rs.intBetween(0, 6);
      assert.isTrue(equivalent(lift(term, 0, cutoff), term));
    }
  });

  it("keeps cached sizes consistent", () => {
    const rs: RandomSeed = create("lift-sizes");
    for (let i = 0; i < 50; i++) {
      const term = randLevelTerm(rs, rs.intBetween(2, 40));
      const lifted = lift(term, rs.intBetween(0, 4), rs.intBetween(0, 4));
      assertSizes(lifted);
      assert.strictEqual(lifted.size, term.size);
    }
  });
});

describe("clone", () => {
  const collectNodes = (term: LevelTerm, nodes: Set<LevelTerm>) => {
    nodes.add(term);
    if (term.kind === "level-func") {
      collectNodes(term.body, nodes);
    } else if (term.kind === "non-terminal") {
      collectNodes(term.lft, nodes);
      collectNodes(term.rgt, nodes);
    }
    return nodes;
  };

  it("produces an equivalent term", () => {
    const term = mkApp(mkFunc(mkApp(mkVar(0), mkVar(4))), mkVar(2));
    assert.deepStrictEqual(clone(term), term);
  });

  it("shares no node with the original", () => {
    const term = mkFunc(mkApp(mkFunc(mkApp(mkVar(1), mkVar(0))), mkVar(0)));
    const original = collectNodes(term, new Set());
    const copy = collectNodes(clone(term), new Set());
    assert.strictEqual(copy.size, term.size);
    for (const node of copy) {
      assert.isFalse(original.has(node));
    }
  });
});
