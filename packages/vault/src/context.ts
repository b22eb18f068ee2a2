/**
 * Operation context — what a single vault operation runs against.
 *
 * Every operation stages its ledger writes in one StoreTransaction and
 * collects the records it wants emitted. The coordinator commits the
 * transaction, then runs `afterCommit` actions, then appends records.
 */

import type { StoreTransaction } from "@tidepool/ledger";
import type { EventSource } from "@tidepool/types";
import type { VaultEventType } from "@tidepool/event-store";
import type { CustodyGateway, VaultConfig, VaultRecord } from "./types.js";

export interface OperationContext {
  readonly tx: StoreTransaction;
  readonly timestamp: string;
  readonly config: VaultConfig;
  readonly custody: CustodyGateway;
  readonly records: VaultRecord[];
  readonly afterCommit: (() => void)[];
}

/**
 * Context for operations that await an external strategy call before
 * committing. A compensation undoes an external effect if the commit
 * is rejected afterwards.
 */
export interface StrategyOperationContext extends OperationContext {
  readonly compensations: (() => Promise<void>)[];
}

function sourceOf(type: VaultEventType): EventSource {
  if (type.startsWith("treasury.")) return "treasury";
  if (type.startsWith("strategy.")) return "strategy";
  return "vault";
}

/**
 * Stage a record for emission once the operation commits.
 */
export function stageRecord(
  ctx: OperationContext,
  streamId: string,
  type: VaultEventType,
  payload: Readonly<Record<string, unknown>>,
): void {
  ctx.records.push({ streamId, type, source: sourceOf(type), payload });
}
