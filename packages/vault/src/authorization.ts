/**
 * Authorization — explicit principal + capability checks.
 *
 * Checked before any state is touched:
 * - Administrative operations need a capability from the Authorizer
 * - Wallet operations need the caller to be the wallet's owner
 */

import type { Principal, WalletAccount, WalletId } from "@tidepool/types";
import type { StoreTransaction } from "@tidepool/ledger";
import { requireWallet } from "@tidepool/ledger";
import type { Authorizer, Capability } from "./types.js";
import { VaultError } from "./types.js";

/**
 * Static principal → capabilities table.
 */
export class RoleAuthorizer implements Authorizer {
  private readonly _grants = new Map<Principal, Set<Capability>>();

  constructor(grants: Readonly<Record<Principal, readonly Capability[]>> = {}) {
    for (const [principal, capabilities] of Object.entries(grants)) {
      this.grant(principal, ...capabilities);
    }
  }

  grant(principal: Principal, ...capabilities: Capability[]): void {
    const granted = this._grants.get(principal) ?? new Set<Capability>();
    for (const capability of capabilities) {
      granted.add(capability);
    }
    this._grants.set(principal, granted);
  }

  revoke(principal: Principal, capability: Capability): void {
    this._grants.get(principal)?.delete(capability);
  }

  authorize(principal: Principal, capability: Capability): boolean {
    return this._grants.get(principal)?.has(capability) ?? false;
  }

  capabilitiesOf(principal: Principal): readonly Capability[] {
    return [...(this._grants.get(principal) ?? [])].sort();
  }
}

export function requireCapability(
  authorizer: Authorizer,
  principal: Principal,
  capability: Capability,
): void {
  if (!authorizer.authorize(principal, capability)) {
    throw new VaultError(
      "NOT_AUTHORIZED",
      `Principal "${principal}" lacks the "${capability}" capability`,
    );
  }
}

/**
 * Load a wallet and check that `principal` owns it.
 */
export function requireOwnedWallet(
  tx: StoreTransaction,
  walletId: WalletId,
  principal: Principal,
): WalletAccount {
  const wallet = requireWallet(tx.wallets, walletId);
  if (wallet.owner !== principal) {
    throw new VaultError(
      "NOT_AUTHORIZED",
      `Principal "${principal}" does not own wallet "${walletId}"`,
    );
  }
  return wallet;
}
