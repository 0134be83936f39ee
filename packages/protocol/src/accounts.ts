/**
 * @ballast/protocol — Well-known protocol accounts.
 */

/** Receives borrowing and redemption fees */
export const FEE_RECIPIENT = "fee-recipient";

/** Holds the liquidation reserve minted for every open trove */
export const GAS_POOL = "gas-pool";
