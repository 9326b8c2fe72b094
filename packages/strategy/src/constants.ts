/**
 * Receipt amounts below this floor are left in reserve on withdrawal
 * instead of being redeemed from the registry.
 */
export const RECEIPT_DUST_FLOOR = 1_000n;
