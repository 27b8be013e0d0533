/**
 * Tests for the Reconciliation Matcher
 *
 * Full outer join on PartnerPin over eligible records:
 * - PresentInBoth → variance = settlement USD - statement amount, in cents
 * - PresentInSettlementOnly / PresentInStatementOnly → no variance
 */

import { matchLedgers, varianceStatus } from '../../src/reconciliation/matchLedgers';
import { DuplicateKeyCollisionError } from '../../src/reconciliation/errors';
import { pin, settlementRecord, statementRecord } from '../helpers/ledgers';

const PIN_A = pin('11111111111');
const PIN_B = pin('22222222222');
const PIN_C = pin('33333333333');

describe('varianceStatus', () => {
  it('should treat variances within the tolerance as reconciled', () => {
    expect(varianceStatus(0, 0.01)).toBe('Reconciled');
    expect(varianceStatus(-0.01, 0.01)).toBe('Reconciled');
  });

  it('should flag larger variances as mismatches', () => {
    expect(varianceStatus(0.02, 0.01)).toBe('AmountMismatch');
    expect(varianceStatus(-2.45, 0.01)).toBe('AmountMismatch');
  });
});

describe('matchLedgers', () => {
  describe('classification', () => {
    it('should compute the rounded variance for pins present in both', () => {
      const { results } = matchLedgers(
        [statementRecord({ pin: PIN_A, settleAmount: 100 })],
        [settlementRecord({ pin: PIN_A, amountUSD: 97.5512 })]
      );

      expect(results).toEqual([
        {
          pin: '11111111111',
          classification: 'PresentInBoth',
          statementAmount: 100,
          settlementAmountUSD: 97.5512,
          amountVariance: -2.45,
          finalStatus: 'AmountMismatch',
        },
      ]);
    });

    it('should mark a variance of one cent as reconciled', () => {
      const { results } = matchLedgers(
        [statementRecord({ pin: PIN_A, settleAmount: 100 })],
        [settlementRecord({ pin: PIN_A, amountUSD: 100.01 })]
      );

      expect(results[0].amountVariance).toBe(0.01);
      expect(results[0].finalStatus).toBe('Reconciled');
    });

    it('should honour a custom variance tolerance', () => {
      const { results } = matchLedgers(
        [statementRecord({ pin: PIN_A, settleAmount: 100 })],
        [settlementRecord({ pin: PIN_A, amountUSD: 97.5512 })],
        { collisionPolicy: 'sum', varianceTolerance: 5 }
      );

      expect(results[0].finalStatus).toBe('Reconciled');
    });

    it('should classify one-sided pins without a variance', () => {
      const { results } = matchLedgers(
        [statementRecord({ pin: PIN_B, settleAmount: 20 })],
        [settlementRecord({ pin: PIN_A, amountUSD: 10 })]
      );

      expect(results).toEqual([
        {
          pin: '11111111111',
          classification: 'PresentInSettlementOnly',
          settlementAmountUSD: 10,
          finalStatus: 'MissingInStatement',
        },
        {
          pin: '22222222222',
          classification: 'PresentInStatementOnly',
          statementAmount: 20,
          finalStatus: 'MissingInSettlement',
        },
      ]);
      expect(results.every((result) => result.amountVariance === undefined)).toBe(true);
    });

    it('should sort results by pin', () => {
      const { results } = matchLedgers(
        [statementRecord({ pin: PIN_C }), statementRecord({ pin: PIN_A })],
        [settlementRecord({ pin: PIN_B })]
      );

      expect(results.map((result) => result.pin)).toEqual([
        '11111111111',
        '22222222222',
        '33333333333',
      ]);
    });

    it('should return no results for empty inputs', () => {
      expect(matchLedgers([], [])).toEqual({ results: [], collisions: [] });
    });
  });

  describe('eligibility', () => {
    it('should drop ineligible records before matching', () => {
      const { results } = matchLedgers(
        [
          statementRecord({ pin: PIN_A, settleAmount: 50, reconcileEligible: false }),
          statementRecord({ pin: PIN_B, settleAmount: 5, reconcileEligible: false }),
        ],
        [settlementRecord({ pin: PIN_A, amountUSD: 48 })]
      );

      expect(results).toEqual([
        {
          pin: '11111111111',
          classification: 'PresentInSettlementOnly',
          settlementAmountUSD: 48,
          finalStatus: 'MissingInStatement',
        },
      ]);
    });

    it('should cover exactly the eligible pins of each side', () => {
      const statement = [
        statementRecord({ pin: PIN_A }),
        statementRecord({ pin: PIN_B }),
        statementRecord({ pin: PIN_C, reconcileEligible: false }),
      ];
      const settlement = [settlementRecord({ pin: PIN_B }), settlementRecord({ pin: PIN_C })];

      const { results } = matchLedgers(statement, settlement);

      const settlementSide = results
        .filter((r) => r.classification !== 'PresentInStatementOnly')
        .map((r) => r.pin);
      const statementSide = results
        .filter((r) => r.classification !== 'PresentInSettlementOnly')
        .map((r) => r.pin);
      expect(settlementSide).toEqual(['22222222222', '33333333333']);
      expect(statementSide).toEqual(['11111111111', '22222222222']);
    });
  });

  describe('key collisions', () => {
    const colliding = [
      statementRecord({ pin: PIN_A, rowNumber: 12, actionLabel: 'Cancel', settleAmount: 30, isDuplicatePin: true }),
      statementRecord({ pin: PIN_A, rowNumber: 14, actionLabel: 'Cancel', settleAmount: 20, isDuplicatePin: true }),
    ];

    it('should sum amounts and report the collision under the sum policy', () => {
      const outcome = matchLedgers(colliding, [settlementRecord({ pin: PIN_A, amountUSD: 50 })], {
        collisionPolicy: 'sum',
        varianceTolerance: 0.01,
      });

      expect(outcome.results).toEqual([
        {
          pin: '11111111111',
          classification: 'PresentInBoth',
          statementAmount: 50,
          settlementAmountUSD: 50,
          amountVariance: 0,
          finalStatus: 'Reconciled',
        },
      ]);
      expect(outcome.collisions).toEqual([
        { source: 'statement', pin: '11111111111', recordCount: 2, rowNumbers: [12, 14] },
      ]);
    });

    it('should throw under the reject policy', () => {
      const run = () =>
        matchLedgers(colliding, [], { collisionPolicy: 'reject', varianceTolerance: 0.01 });

      expect(run).toThrow(DuplicateKeyCollisionError);
      expect(run).toThrow('PartnerPin 11111111111 has 2 eligible statement records');
    });
  });
});
