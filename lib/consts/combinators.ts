/**
 * Predefined closed level terms.
 *
 * This module provides the classic combinators written with De Bruijn levels,
 * each meant to sit at depth 0. Placing one deeper in a term requires lifting
 * it by the depth first.
 *
 * @module
 */
import { mkApp, mkFunc, mkVar } from "../level/term.ts";

/*
 * Identity.
 *
 * λx.x ≡ λ.0
 */
export const I = mkFunc(mkVar(0));

/*
 * Constant. Keeps the first of two arguments.
 *
 * λxy.x ≡ λ.λ.0
 */
export const K = mkFunc(mkFunc(mkVar(0)));

/*
 * Substitution.
 *
 * λxyz.xz(yz) ≡ λ.λ.λ.((0 2) (1 2))
 */
export const S = mkFunc(mkFunc(mkFunc(
  mkApp(
    mkApp(mkVar(0), mkVar(2)),
    mkApp(mkVar(1), mkVar(2)),
  ),
)));

/*
 * Self application.
 *
 * λx.xx ≡ λ.(0 0)
 */
export const SelfApply = mkFunc(mkApp(mkVar(0), mkVar(0)));

/*
 * Omega. Reduces to itself in one step, forever.
 *
 * (λx.xx)(λx.xx)
 */
export const Omega = mkApp(SelfApply, SelfApply);
