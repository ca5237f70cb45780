import { formatDividendAmount, renderDividendAlertEmail } from './dividend-alert.template';

const branding = { appName: 'StockFolio' };

const base = {
  stockSymbol: 'AAPL',
  dividendDate: '2026-11-14',
  dividendAmount: 0.24,
  currency: 'USD',
  daysAdvance: 3,
};

describe('formatDividendAmount', () => {
  it('formats with the currency symbol and 2-4 decimals', () => {
    expect(formatDividendAmount(0.24, 'USD')).toBe('$0.24');
    expect(formatDividendAmount(1.5, 'EUR')).toBe('€1.50');
    expect(formatDividendAmount(0.2425, 'USD')).toBe('$0.2425');
    expect(formatDividendAmount(1.23456, 'GBP')).toBe('£1.2346');
  });
});

describe('renderDividendAlertEmail', () => {
  it('renders subject, amount and lead time', () => {
    const email = renderDividendAlertEmail(base, branding);

    expect(email.subject).toBe('AAPL Dividend Alert (3 days early)');
    expect(email.html).toContain(
      '<p><strong>AAPL</strong> is paying a dividend of <strong>$0.24</strong> on <strong>2026-11-14</strong>.</p>',
    );
    expect(email.html).toContain('<p>This alert was sent 3 days in advance.</p>');
    expect(email.html).not.toContain('Payment frequency');
    expect(email.text).toBe(
      [
        'Dividend Alert: AAPL',
        '',
        'AAPL is paying a dividend of $0.24 on 2026-11-14.',
        '',
        'This alert was sent 3 days in advance.',
        '',
        'Best regards,',
        'StockFolio',
      ].join('\n'),
    );
  });

  it('adds the payment frequency when given', () => {
    const email = renderDividendAlertEmail({ ...base, frequency: 'quarterly' }, branding);
    expect(email.html).toContain('<p>Payment frequency: quarterly</p>');
    expect(email.text).toContain('AAPL is paying a dividend of $0.24 on 2026-11-14.\nPayment frequency: quarterly\n');
  });

  it('uses the singular for a one-day lead time', () => {
    const email = renderDividendAlertEmail({ ...base, daysAdvance: 1 }, branding);
    expect(email.subject).toBe('AAPL Dividend Alert (1 day early)');
    expect(email.text).toContain('This alert was sent 1 day in advance.');
  });

  it('formats non-USD amounts', () => {
    const email = renderDividendAlertEmail({ ...base, stockSymbol: 'SAP', dividendAmount: 2.2, currency: 'EUR' }, branding);
    expect(email.text).toContain('SAP is paying a dividend of €2.20 on 2026-11-14.');
  });

  it('is deterministic for identical input', () => {
    expect(renderDividendAlertEmail(base, branding)).toEqual(renderDividendAlertEmail({ ...base }, branding));
  });
});
