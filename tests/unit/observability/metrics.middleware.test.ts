import { normalizePath } from '../../../src/observability/metrics.middleware';

describe('normalizePath', () => {
  it('folds prefixed record ids', () => {
    expect(normalizePath('/charges/chg_3b241101-e2bb-4255-8caf-4136c566a962')).toBe('/charges/:id');
    expect(
      normalizePath('/installments/orders/ord_3b241101-e2bb-4255-8caf-4136c566a962/installments')
    ).toBe('/installments/orders/:id/installments');
  });

  it('folds customer ids under /wallets', () => {
    expect(normalizePath('/wallets/cust-42/ledger')).toBe('/wallets/:customerId/ledger');
    expect(normalizePath('/wallets')).toBe('/wallets');
  });

  it('folds numeric segments', () => {
    expect(normalizePath('/webhooks/logs/123')).toBe('/webhooks/logs/:id');
  });

  it('leaves static paths alone', () => {
    expect(normalizePath('/installments/due/process')).toBe('/installments/due/process');
  });
});
