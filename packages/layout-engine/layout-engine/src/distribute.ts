/**
 * Integer space distribution shared by horizontal (box) and vertical (vbox)
 * allocation.
 */

/**
 * Splits `total` whole pixels in proportion to `weights` using largest-remainder
 * rounding, so the shares always sum to exactly `total`. Ties go to the earlier
 * entry. Entries with a non-positive weight receive nothing.
 *
 * @example
 * ```typescript
 * distributeProportionally(100, [1, 1, 1]); // [34, 33, 33]
 * ```
 */
export function distributeProportionally(total: number, weights: readonly number[]): number[] {
  const pixels = Math.floor(total);
  const positive = weights.map((weight) => (Number.isFinite(weight) && weight > 0 ? weight : 0));
  const sum = positive.reduce((acc, weight) => acc + weight, 0);
  if (pixels <= 0 || sum <= 0) return positive.map(() => 0);

  const quotas = positive.map((weight) => (pixels * weight) / sum);
  const shares = quotas.map((quota) => Math.floor(quota));
  let remainder = pixels - shares.reduce((acc, share) => acc + share, 0);

  const order = quotas
    .map((quota, index) => ({ index, fraction: quota - Math.floor(quota) }))
    .filter(({ index }) => positive[index] > 0)
    .sort((a, b) => b.fraction - a.fraction || a.index - b.index);

  for (let i = 0; remainder > 0 && order.length > 0; i = (i + 1) % order.length) {
    shares[order[i].index] += 1;
    remainder -= 1;
  }
  return shares;
}

export type BoxSlot = {
  /** Smallest width the child can take without breaking a word. */
  required: number;
  /** Horizontal fill ratio; zero or less means content-sized. */
  fill: number;
  /** Anchors sit in the flow but take no width. */
  participates: boolean;
};

/**
 * Allocates the widths of a box's children.
 *
 * - With any positive fill: content-sized children take their required width
 *   and fill children split what is left by ratio.
 * - Without fills: each child takes the larger of its required width and an
 *   equal share, the share being recomputed over the children not already held
 *   at their required width.
 * - When the required widths do not fit, every child keeps its required width.
 */
export function allocateBoxWidths(available: number, slots: readonly BoxSlot[]): number[] {
  const widths = slots.map(() => 0);
  const active: number[] = [];
  slots.forEach((slot, index) => {
    if (slot.participates) active.push(index);
  });
  if (active.length === 0) return widths;

  const fillers = active.filter((index) => slots[index].fill > 0);
  if (fillers.length > 0) {
    let fixed = 0;
    for (const index of active) {
      if (slots[index].fill > 0) continue;
      widths[index] = slots[index].required;
      fixed += slots[index].required;
    }
    const shares = distributeProportionally(
      Math.max(0, available - fixed),
      fillers.map((index) => slots[index].fill),
    );
    fillers.forEach((index, i) => {
      widths[index] = shares[i];
    });
    return widths;
  }

  const totalRequired = active.reduce((acc, index) => acc + slots[index].required, 0);
  if (totalRequired >= available) {
    for (const index of active) widths[index] = slots[index].required;
    return widths;
  }

  let unfixed = active;
  let remaining = available;
  for (;;) {
    const share = remaining / unfixed.length;
    const oversized = unfixed.filter((index) => slots[index].required > share);
    if (oversized.length === 0) break;
    for (const index of oversized) {
      widths[index] = slots[index].required;
      remaining -= slots[index].required;
    }
    unfixed = unfixed.filter((index) => slots[index].required <= share);
  }

  const shares = distributeProportionally(
    remaining,
    unfixed.map(() => 1),
  );
  unfixed.forEach((index, i) => {
    widths[index] = shares[i];
  });
  return widths;
}
