export type Arity = {
  minArgs: number;
  maxArgs: number;
};

/**
 * Split `available` free tokens over positionals in registration order.
 *
 * Each positional takes as many tokens as it may, except those needed to satisfy the
 * minimums of the positionals after it. With A(1..∞), B(1..1) and three tokens, A gets
 * two and B gets one. Tokens left over after the last positional are not assigned.
 */
export function distributeFreeArguments(arities: readonly Arity[], available: number): number[] {
  const reserved = new Array<number>(arities.length).fill(0);
  for (let i = arities.length - 2; i >= 0; i--) reserved[i] = reserved[i + 1] + arities[i + 1].minArgs;

  const counts: number[] = [];
  let remaining = available;
  arities.forEach(({ minArgs, maxArgs }, i) => {
    const spare = Math.max(0, remaining - reserved[i]);
    const take = Math.min(maxArgs, remaining, Math.max(Math.min(minArgs, remaining), spare));
    counts.push(take);
    remaining -= take;
  });
  return counts;
}
