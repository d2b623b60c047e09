import { record } from "./ledger.js";

export function charge(amount: number): string {
  record("charge", amount);
  return `ch_${amount}`;
}

export const refund = (amount: number): string => {
  record("refund", -amount);
  return charge(-amount);
};
