import { renderPasswordResetEmail } from './password-reset.template';

const branding = { appName: 'StockFolio' };

describe('renderPasswordResetEmail', () => {
  it('renders the reset link and greeting', () => {
    const email = renderPasswordResetEmail({ resetUrl: 'https://x/r/abc', username: 'Sam' }, branding);

    expect(email.subject).toBe('Reset Your StockFolio Password');
    expect(email.html).toContain('<title>Reset Your Password</title>');
    expect(email.html).toContain('<p>Hello Sam,</p>');
    expect(email.html).toContain('href="https://x/r/abc"');
    expect(email.html).toContain('>Reset Password</a>');
    expect(email.text).toBe(
      [
        'Reset Your Password',
        '',
        'Hello Sam,',
        '',
        'You requested to reset your password. Visit this link to create a new password:',
        'https://x/r/abc',
        '',
        'This link will expire in 24 hours.',
        '',
        "If you didn't request this, please ignore this email. Your password will remain unchanged.",
        '',
        'Best regards,',
        'StockFolio Team',
      ].join('\n'),
    );
  });

  it('defaults the username', () => {
    const email = renderPasswordResetEmail({ resetUrl: 'https://x/r/abc', username: null }, branding);
    expect(email.text).toContain('Hello User,');
  });

  it('is deterministic for identical input', () => {
    const a = renderPasswordResetEmail({ resetUrl: 'https://x/r/abc' }, branding);
    const b = renderPasswordResetEmail({ resetUrl: 'https://x/r/abc' }, branding);
    expect(b).toEqual(a);
  });
});
