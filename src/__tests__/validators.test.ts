import { ValidationChain, validationResult } from 'express-validator';
import { authValidators } from '../validators/auth.validators';
import { legacyMailValidators, sendValidators } from '../validators/mail.validators';

const runValidators = async (validators: ValidationChain[], data: Record<string, unknown>) => {
  const req = { body: data };
  for (const v of validators) {
    await v.run(req);
  }
  return { result: validationResult(req), body: req.body };
};

describe('Auth validators', () => {
  it('accepts an email and app password', async () => {
    const { result } = await runValidators(authValidators, {
      email: 'user@example.com',
      password: 'abcd efgh ijkl mnop',
    });
    expect(result.isEmpty()).toBe(true);
  });

  it('rejects an empty email', async () => {
    const { result } = await runValidators(authValidators, { email: '', password: 'secret' });
    expect(result.array().map((e) => e.msg)).toContain('Provide an email');
  });

  it('rejects an invalid email', async () => {
    const { result } = await runValidators(authValidators, { email: 'not-an-email', password: 'secret' });
    expect(result.array().map((e) => e.msg)).toEqual(['Invalid email']);
  });

  it('rejects a missing password', async () => {
    const { result } = await runValidators(authValidators, { email: 'user@example.com' });
    expect(result.array().map((e) => e.msg)).toContain('Provide the app password');
  });
});

describe('Send validators', () => {
  const validators = sendValidators(10);

  it('turns a single recipient into a list', async () => {
    const { result, body } = await runValidators(validators, {
      recipients: ' a@b.com ',
      subject: 'Hi',
      body: 'Text',
    });
    expect(result.isEmpty()).toBe(true);
    expect(body.recipients).toEqual(['a@b.com']);
  });

  it('converts is_html and repeat', async () => {
    const { result, body } = await runValidators(validators, {
      recipients: ['a@b.com'],
      subject: 'Hi',
      body: '<b>x</b>',
      is_html: true,
      repeat: '3',
    });
    expect(result.isEmpty()).toBe(true);
    expect(body.is_html).toBe(true);
    expect(body.repeat).toBe(3);
  });

  it('rejects a bad recipient in a list', async () => {
    const { result } = await runValidators(validators, {
      recipients: ['a@b.com', 'nope'],
      subject: 'Hi',
      body: 'Text',
    });
    expect(result.array().map((e) => e.msg)).toEqual(['Each recipients entry must be a valid email']);
  });

  it('rejects an empty recipient list', async () => {
    const { result } = await runValidators(validators, { recipients: [], subject: 'Hi', body: 'Text' });
    expect(result.array().map((e) => e.msg)).toEqual(['recipients must be an email or a list of emails']);
  });

  it('rejects repeat above the limit', async () => {
    const { result } = await runValidators(validators, {
      recipients: 'a@b.com',
      subject: 'Hi',
      body: 'Text',
      repeat: 11,
    });
    expect(result.array().map((e) => e.msg)).toEqual(['repeat must be an integer from 1 to 10']);
  });

  it('validates optional cc and reply_to', async () => {
    const { result, body } = await runValidators(validators, {
      recipients: 'a@b.com',
      subject: 'Hi',
      body: 'Text',
      cc: 'cc@b.com',
      reply_to: 'bad',
    });
    expect(body.cc).toEqual(['cc@b.com']);
    expect(result.array().map((e) => e.msg)).toEqual(['reply_to must be a valid email']);
  });

  it('requires subject and body', async () => {
    const { result } = await runValidators(validators, { recipients: 'a@b.com' });
    expect(result.array().map((e) => e.msg)).toEqual(['subject is required', 'body is required']);
  });
});

describe('Legacy mail validators', () => {
  it('accepts the original body shape', async () => {
    const { result, body } = await runValidators(legacyMailValidators(10), {
      recipient_email: 'a@b.com',
      subject: 'Hi',
      body: 'Text',
      quantity: 2,
      token: 'abc',
    });
    expect(result.isEmpty()).toBe(true);
    expect(body.quantity).toBe(2);
  });

  it('requires a token', async () => {
    const { result } = await runValidators(legacyMailValidators(10), {
      recipient_email: 'a@b.com',
      subject: 'Hi',
      body: 'Text',
    });
    expect(result.array().map((e) => e.msg)).toEqual(['token is required']);
  });
});
