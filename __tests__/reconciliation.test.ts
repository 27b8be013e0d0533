import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../src/app';
import { settlementTable, statementTable, toCsv } from './helpers/ledgers';

const ENDPOINT = '/api/v1/reconciliation';

const statementCsv = Buffer.from(
  toCsv(
    statementTable([
      { action: 'Cancel', description: 'Payout PIN12345678901', amount: '50.00' },
      { action: 'Dollar Received', description: 'Payout PIN12345678901', amount: '50.00' },
    ])
  )
);

const settlementCsv = Buffer.from(
  toCsv(settlementTable([{ pin: '12345678901', action: 'Sale', payout: '48.00', rate: '1.0' }]))
);

describe('Reconciliation Endpoint', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  describe('POST /api/v1/reconciliation', () => {
    it('should return the reconciliation as JSON by default', async () => {
      const response = await request(app)
        .post(ENDPOINT)
        .attach('statement', statementCsv, 'statement.csv')
        .attach('settlement', settlementCsv, 'settlement.csv');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('success', true);
      expect(response.body).toHaveProperty('message', 'Reconciled 1 PartnerPins');
      expect(typeof response.body.data.runId).toBe('string');
      expect(response.body.data.statementFile).toBe('statement.csv');
      expect(response.body.data.settlementFile).toBe('settlement.csv');
      expect(response.body.data.results).toEqual([
        {
          pin: '12345678901',
          classification: 'PresentInBoth',
          statementAmount: 50,
          settlementAmountUSD: 48,
          amountVariance: -2,
          finalStatus: 'AmountMismatch',
        },
      ]);
    });

    it('should apply a varianceTolerance override', async () => {
      const response = await request(app)
        .post(`${ENDPOINT}?varianceTolerance=5`)
        .attach('statement', statementCsv, 'statement.csv')
        .attach('settlement', settlementCsv, 'settlement.csv');

      expect(response.status).toBe(200);
      expect(response.body.data.results[0].finalStatus).toBe('Reconciled');
    });

    it('should return the result table as a CSV download', async () => {
      const response = await request(app)
        .post(`${ENDPOINT}?format=csv`)
        .attach('statement', statementCsv, 'statement.csv')
        .attach('settlement', settlementCsv, 'settlement.csv');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toMatch(/^text\/csv/);
      expect(response.headers['content-disposition']).toBe(
        'attachment; filename="reconciliation_result.csv"'
      );

      const lines = response.text.split('\n');
      expect(lines[0]).toBe(
        'PartnerPin,Classification,StatementAmount,SettlementAmountUSD,AmountVariance,FinalReconcileStatus'
      );
      expect(lines[1]).toBe('12345678901,Present in Both,50.00,48.00,-2.00,Amount Mismatch');
    });

    it('should return the result table as an XLSX download', async () => {
      const response = await request(app)
        .post(`${ENDPOINT}?format=xlsx`)
        .attach('statement', statementCsv, 'statement.csv')
        .attach('settlement', settlementCsv, 'settlement.csv');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toMatch(/spreadsheetml\.sheet/);
      expect(response.headers['content-disposition']).toBe(
        'attachment; filename="reconciliation_result.xlsx"'
      );
    });

    it('should reject a request without a settlement file', async () => {
      const response = await request(app)
        .post(ENDPOINT)
        .attach('statement', statementCsv, 'statement.csv');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body).toHaveProperty('error', 'Missing "settlement" file upload');
    });

    it('should reject unsupported file types', async () => {
      const response = await request(app)
        .post(ENDPOINT)
        .attach('statement', Buffer.from('not a ledger'), 'notes.txt');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty(
        'error',
        'Only .csv, .xlsx and .xls files are allowed (got notes.txt)'
      );
    });

    it('should reject an unknown output format', async () => {
      const response = await request(app)
        .post(`${ENDPOINT}?format=pdf`)
        .attach('statement', statementCsv, 'statement.csv')
        .attach('settlement', settlementCsv, 'settlement.csv');

      expect(response.status).toBe(400);
      expect(response.body.error).toMatch(/^Validation failed: format/);
    });

    it('should reject an empty varianceTolerance', async () => {
      const response = await request(app)
        .post(`${ENDPOINT}?varianceTolerance=`)
        .attach('statement', statementCsv, 'statement.csv')
        .attach('settlement', settlementCsv, 'settlement.csv');

      expect(response.status).toBe(400);
      expect(response.body.error).toMatch(/^Validation failed: varianceTolerance/);
    });

    it('should return 422 for a statement without its header row', async () => {
      const response = await request(app)
        .post(ENDPOINT)
        .attach('statement', Buffer.from('Partner Statement\nPeriod\nTotals'), 'statement.csv')
        .attach('settlement', settlementCsv, 'settlement.csv');

      expect(response.status).toBe(422);
      expect(response.body).toHaveProperty(
        'error',
        'Invalid statement ledger: expected a header on row 10 but the sheet has 3 rows'
      );
    });

    it('should return 422 for key collisions under the reject policy', async () => {
      const collidingStatement = Buffer.from(
        toCsv(
          statementTable([
            { action: 'Cancel', description: 'Payout PIN12345678901', amount: '20.00' },
            { action: 'Cancel', description: 'Payout PIN12345678901', amount: '28.00' },
          ])
        )
      );

      const response = await request(app)
        .post(`${ENDPOINT}?collisionPolicy=reject`)
        .attach('statement', collidingStatement, 'statement.csv')
        .attach('settlement', settlementCsv, 'settlement.csv');

      expect(response.status).toBe(422);
      expect(response.body).toHaveProperty(
        'error',
        'PartnerPin 12345678901 has 2 eligible statement records'
      );
    });

    it('should fold key collisions under the default sum policy', async () => {
      const collidingStatement = Buffer.from(
        toCsv(
          statementTable([
            { action: 'Cancel', description: 'Payout PIN12345678901', amount: '20.00' },
            { action: 'Cancel', description: 'Payout PIN12345678901', amount: '28.00' },
          ])
        )
      );

      const response = await request(app)
        .post(ENDPOINT)
        .attach('statement', collidingStatement, 'statement.csv')
        .attach('settlement', settlementCsv, 'settlement.csv');

      expect(response.status).toBe(200);
      expect(response.body.data.results[0]).toMatchObject({
        statementAmount: 48,
        amountVariance: 0,
        finalStatus: 'Reconciled',
      });
      expect(response.body.data.summary.collisions).toEqual([
        { source: 'statement', pin: '12345678901', recordCount: 2, rowNumbers: [12, 13] },
      ]);
    });
  });
});
