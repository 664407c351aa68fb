/**
 * Lot ordering — the iteration basis for selection.
 *
 * Newest lots first: they have accrued the least weight, so spending
 * them first gives up the least.
 */

import type { AssetId, Lot, OwnerId } from "@granary/types";
import type { LotReader } from "@granary/ledger";
import { PlanError } from "./errors.js";

/**
 * An owner's lots of one asset, descending by creation index.
 * Throws NO_LOTS when there are none.
 */
export function orderedLots(reader: LotReader, owner: OwnerId, asset: AssetId): readonly Lot[] {
  const lots = [...reader.lotsOf(owner, asset)];
  if (lots.length === 0) {
    throw new PlanError("NO_LOTS", `'${owner}' holds no lots of '${asset}'`);
  }
  return lots.sort((a, b) => (a.index > b.index ? -1 : a.index < b.index ? 1 : 0));
}
