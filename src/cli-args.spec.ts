import { parseArgs } from './cli-args';

describe('parseArgs', () => {
  it('joins the request words and reads the flags', () => {
    expect(
      parseArgs(['summarize', 'my', 'emails', '--account', 'me@example.com', '--calendly-key', 'team', '--json']),
    ).toEqual({ text: 'summarize my emails', accountEmail: 'me@example.com', calendlyKey: 'team', json: true });
  });

  it('defaults to plain text output', () => {
    expect(parseArgs(['send jane@example.com my link'])).toEqual({ text: 'send jane@example.com my link', json: false });
  });

  it.each([[[]], [['--json']], [['hello', '--account']], [['hello', '--account', '--json']]])(
    'rejects %p',
    (argv) => {
      expect(parseArgs(argv)).toBeUndefined();
    },
  );
});
