import { listAccounts, listCategories, type BudgetSnapshot } from '../entities/BudgetSnapshot.js';
import { isNegative } from '../money.js';
import { toMonthKey } from '../months.js';
import { runningBalance } from './overspending.js';

export const CREDIT_CARD_ACCOUNT_TYPE = 'creditCard';

export interface CreditCardStatus {
  accountId: string;
  accountName: string;
  balance: number; // milliunits, negative = owed
  owed: number;
  paymentCategoryId: string | null;
  paymentCategoryName: string | null;
  paymentAvailable: number;
  /** payment available minus owed; negative when the card is underfunded */
  discrepancy: number;
  underfunded: boolean;
}

export interface CreditCardReport {
  month: string;
  cards: CreditCardStatus[];
  totalOwed: number;
  totalPaymentAvailable: number;
}

/**
 * Open credit card accounts against their payment categories. The budget keeps
 * one payment category per card, named after the card, in a "Credit Card
 * Payments" group.
 */
export function analyzeCreditCards(snapshot: BudgetSnapshot, month: string): CreditCardReport {
  const key = toMonthKey(month);

  const paymentCategories = new Map<string, { id: string; name: string }>();
  for (const category of listCategories(snapshot)) {
    const group = snapshot.categoryGroups.get(category.groupId);
    if (group && group.name.toLowerCase().includes('credit card')) {
      paymentCategories.set(category.name.toLowerCase(), category);
    }
  }

  const cards = listAccounts(snapshot)
    .filter((a) => a.type === CREDIT_CARD_ACCOUNT_TYPE)
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((card): CreditCardStatus => {
      const payment = paymentCategories.get(card.name.toLowerCase()) ?? null;
      const paymentAvailable = payment ? runningBalance(snapshot, key, payment.id).balance : 0;
      const owed = Math.max(0, -card.balance);
      const discrepancy = paymentAvailable - owed;
      return {
        accountId: card.id,
        accountName: card.name,
        balance: card.balance,
        owed,
        paymentCategoryId: payment?.id ?? null,
        paymentCategoryName: payment?.name ?? null,
        paymentAvailable,
        discrepancy,
        underfunded: isNegative(discrepancy),
      };
    });

  return {
    month: key,
    cards,
    totalOwed: cards.reduce((sum, c) => sum + c.owed, 0),
    totalPaymentAvailable: cards.reduce((sum, c) => sum + c.paymentAvailable, 0),
  };
}
