/**
 * @fileoverview OverloadResolver - Picks a Declared Overload at Call Time
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/dispatch
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Resolution Algorithm
 *
 * ```
 * resolve(entry, name, args)
 *   1. Candidates: overloads named `name` with exactly args.length parameters
 *   2. Match every argument against its parameter (see MatchRank)
 *      - a callback coercion is only allowed on the last parameter
 *      - one unmatched argument disqualifies the candidate
 *   3. Order the survivors by
 *      a. total rank
 *      b. number of coercions (none beats some)
 *      c. declaration order
 *   4. First survivor wins; no survivor is a no-match
 * ```
 *
 * Resolution is a pure function of the entry and the arguments. A no-match is
 * not an error: the caller hands it to the missing-member protocol.
 *
 * @version 1.0.0
 */

import {
  type IArgumentMatch,
  type IMethodDescriptor,
  type IRegistryEntry,
  matchArgument,
} from '../../domain';

/**
 * A selected overload and how each argument matched it.
 */
export interface IOverloadMatch {
  readonly kind: 'match';
  readonly method: IMethodDescriptor;
  readonly matches: readonly IArgumentMatch[];
}

/**
 * No overload accepts the arguments.
 */
export interface IOverloadNoMatch {
  readonly kind: 'no-match';
  readonly name: string;

  /** Overloads with the right name, whatever their arity. */
  readonly declared: number;
}

export type OverloadResolution = IOverloadMatch | IOverloadNoMatch;

interface IScoredCandidate {
  readonly method: IMethodDescriptor;
  readonly matches: readonly IArgumentMatch[];
  readonly rank: number;
  readonly coercions: number;
}

/**
 * OverloadResolver - ranked selection among same-named declarations.
 *
 * @example
 * ```typescript
 * const resolution = resolver.resolve(entry, 'overloaded', ['1', () => {}]);
 * if (resolution.kind === 'match') {
 *   resolution.method.implementation;   // 'overloadedString'
 * }
 * ```
 */
export class OverloadResolver {
  resolve(entry: IRegistryEntry, name: string, args: readonly unknown[]): OverloadResolution {
    const overloads = entry.methods.get(name) ?? [];
    let best: IScoredCandidate | undefined;

    for (const method of overloads) {
      if (method.parameters.length !== args.length) {
        continue;
      }

      const candidate = this.score(method, args);
      if (candidate && (!best || compareCandidates(candidate, best) < 0)) {
        best = candidate;
      }
    }

    if (!best) {
      return { kind: 'no-match', name, declared: overloads.length };
    }

    return { kind: 'match', method: best.method, matches: best.matches };
  }

  private score(method: IMethodDescriptor, args: readonly unknown[]): IScoredCandidate | undefined {
    const matches: IArgumentMatch[] = [];
    const last = method.parameters.length - 1;
    let rank = 0;
    let coercions = 0;

    for (const [index, parameter] of method.parameters.entries()) {
      const match = matchArgument(parameter, args[index]);
      if (!match || (match.coercion === 'callback' && index !== last)) {
        return undefined;
      }

      matches.push(match);
      rank += match.rank;
      if (match.coercion !== 'none') {
        coercions += 1;
      }
    }

    return { method, matches, rank, coercions };
  }
}

function compareCandidates(left: IScoredCandidate, right: IScoredCandidate): number {
  return (
    left.rank - right.rank ||
    left.coercions - right.coercions ||
    left.method.order - right.method.order
  );
}
