import { PositiveDecimal } from '@txledger/core';
import { describe, expect, it } from 'vitest';

import {
  AccountLockedError,
  InsufficientFundsError,
  TransactionNotFoundError,
} from '../../errors/ledger-errors.js';
import { ClientAccount } from '../client-account.js';
import { createTransactionRecord, typeAdjustedAmount } from '../transaction-record.js';

const amount = (value: string) => PositiveDecimal.create(value)._unsafeUnwrap();

function balances(account: ClientAccount) {
  const snapshot = account.toSnapshot();
  return {
    available: snapshot.available.toFixed(),
    held: snapshot.held.toFixed(),
    total: snapshot.total.toFixed(),
    locked: snapshot.locked,
  };
}

describe('typeAdjustedAmount', () => {
  it('should be positive for deposits and negative for withdrawals', () => {
    expect(typeAdjustedAmount(createTransactionRecord('deposit', amount('2.5'))).toFixed()).toBe('2.5');
    expect(typeAdjustedAmount(createTransactionRecord('withdrawal', amount('2.5'))).toFixed()).toBe('-2.5');
  });
});

describe('ClientAccount', () => {
  it('should start empty and unlocked', () => {
    const account = new ClientAccount(7);

    expect(account.clientId).toBe(7);
    expect(balances(account)).toEqual({ available: '0', held: '0', total: '0', locked: false });
  });

  describe('deposit and withdraw', () => {
    it('should credit and debit available funds', () => {
      const account = new ClientAccount(1);
      account.deposit(1, amount('10.25'));

      const result = account.withdraw(2, amount('4.05'));

      expect(result.isOk()).toBe(true);
      expect(balances(account)).toEqual({ available: '6.2', held: '0', total: '6.2', locked: false });
      expect(account.transactionState(1)).toBe('open');
      expect(account.transactionState(2)).toBe('open');
    });

    it('should allow withdrawing the full available balance', () => {
      const account = new ClientAccount(1);
      account.deposit(1, amount('3'));

      expect(account.withdraw(2, amount('3')).isOk()).toBe(true);
      expect(balances(account).available).toBe('0');
    });

    it('should reject a withdrawal larger than available and leave state untouched', () => {
      const account = new ClientAccount(1);
      account.deposit(1, amount('5'));

      const result = account.withdraw(2, amount('5.0001'));

      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(InsufficientFundsError);
      expect(error.code).toBe('INSUFFICIENT_FUNDS');
      expect(error.message).toBe('Cannot withdraw 5.0001: available balance of account 1 is 5');
      expect(balances(account)).toEqual({ available: '5', held: '0', total: '5', locked: false });
      expect(account.transactionState(2)).toBeUndefined();
    });
  });

  describe('dispute', () => {
    it('should move a deposit from available to held', () => {
      const account = new ClientAccount(1);
      account.deposit(1, amount('8'));
      account.deposit(2, amount('2'));

      expect(account.dispute(2).isOk()).toBe(true);
      expect(balances(account)).toEqual({ available: '8', held: '2', total: '10', locked: false });
      expect(account.transactionState(2)).toBe('disputed');
    });

    it('should make held negative when a withdrawal is disputed', () => {
      const account = new ClientAccount(1);
      account.deposit(1, amount('10'));
      account.withdraw(2, amount('4'))._unsafeUnwrap();

      expect(account.dispute(2).isOk()).toBe(true);
      expect(balances(account)).toEqual({ available: '10', held: '-4', total: '6', locked: false });
    });

    it('should allow available to go negative', () => {
      const account = new ClientAccount(1);
      account.deposit(1, amount('10'));
      account.withdraw(2, amount('7'))._unsafeUnwrap();

      expect(account.dispute(1).isOk()).toBe(true);
      expect(balances(account)).toEqual({ available: '-7', held: '10', total: '3', locked: false });
    });

    it('should reject unknown and already disputed transactions', () => {
      const account = new ClientAccount(3);
      account.deposit(1, amount('1'));
      account.dispute(1)._unsafeUnwrap();

      const unknown = account.dispute(99)._unsafeUnwrapErr();
      expect(unknown).toBeInstanceOf(TransactionNotFoundError);
      expect(unknown.message).toBe('Cannot dispute: transaction 99 is not open on account 3');

      const twice = account.dispute(1)._unsafeUnwrapErr();
      expect(twice).toBeInstanceOf(TransactionNotFoundError);
      expect(balances(account)).toEqual({ available: '0', held: '1', total: '1', locked: false });
    });

    it('should keep a disputed id out of the open map when a later movement reuses it', () => {
      const account = new ClientAccount(4);
      account.deposit(1, amount('5'));
      account.dispute(1)._unsafeUnwrap();

      account.deposit(1, amount('2'));
      account.withdraw(1, amount('1'))._unsafeUnwrap();
      expect(balances(account)).toEqual({ available: '1', held: '5', total: '6', locked: false });
      expect(account.transactionState(1)).toBe('disputed');
      expect(account.dispute(1)._unsafeUnwrapErr()).toBeInstanceOf(TransactionNotFoundError);

      account.resolve(1)._unsafeUnwrap();
      expect(balances(account)).toEqual({ available: '6', held: '0', total: '6', locked: false });
      expect(account.transactionState(1)).toBe('open');
    });
  });

  describe('resolve', () => {
    it('should return held funds and reopen the transaction', () => {
      const account = new ClientAccount(1);
      account.deposit(1, amount('6'));
      account.dispute(1)._unsafeUnwrap();

      expect(account.resolve(1).isOk()).toBe(true);
      expect(balances(account)).toEqual({ available: '6', held: '0', total: '6', locked: false });
      expect(account.transactionState(1)).toBe('open');

      expect(account.dispute(1).isOk()).toBe(true);
      expect(balances(account).held).toBe('6');
    });

    it('should reject a transaction that is not under dispute', () => {
      const account = new ClientAccount(2);
      account.deposit(1, amount('6'));

      const error = account.resolve(1)._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(TransactionNotFoundError);
      expect(error.message).toBe('Cannot resolve: transaction 1 is not under dispute on account 2');
    });
  });

  describe('chargeback', () => {
    it('should remove held funds, forget the transaction and lock the account', () => {
      const account = new ClientAccount(1);
      account.deposit(1, amount('8'));
      account.deposit(2, amount('2'));
      account.dispute(2)._unsafeUnwrap();

      expect(account.chargeback(2).isOk()).toBe(true);
      expect(balances(account)).toEqual({ available: '8', held: '0', total: '8', locked: true });
      expect(account.transactionState(2)).toBeUndefined();
      expect(account.isLocked()).toBe(true);
    });

    it('should reject a transaction that is only open', () => {
      const account = new ClientAccount(1);
      account.deposit(1, amount('8'));

      expect(account.chargeback(1)._unsafeUnwrapErr()).toBeInstanceOf(TransactionNotFoundError);
      expect(account.isLocked()).toBe(false);
    });
  });

  describe('locked account', () => {
    function lockedAccount(): ClientAccount {
      const account = new ClientAccount(4);
      account.deposit(1, amount('5'));
      account.deposit(2, amount('5'));
      account.dispute(2)._unsafeUnwrap();
      account.dispute(1)._unsafeUnwrap();
      account.chargeback(2)._unsafeUnwrap();
      return account;
    }

    it('should still accept deposits', () => {
      const account = lockedAccount();
      account.deposit(3, amount('1.5'));

      expect(balances(account)).toEqual({ available: '1.5', held: '5', total: '6.5', locked: true });
    });

    it('should reject every other operation', () => {
      const account = lockedAccount();
      account.deposit(3, amount('1.5'));

      for (const result of [
        account.withdraw(4, amount('1')),
        account.dispute(3),
        account.resolve(1),
        account.chargeback(1),
      ]) {
        expect(result._unsafeUnwrapErr()).toBeInstanceOf(AccountLockedError);
      }

      expect(account.withdraw(4, amount('1'))._unsafeUnwrapErr().message).toBe(
        'Cannot withdraw: account 4 is locked'
      );
      expect(balances(account)).toEqual({ available: '1.5', held: '5', total: '6.5', locked: true });
    });
  });
});
