export interface CliArgs {
  text: string;
  accountEmail?: string;
  calendlyKey?: string;
  json: boolean;
}

export function parseArgs(argv: string[]): CliArgs | undefined {
  const words: string[] = [];
  const args: CliArgs = { text: '', json: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--json') {
      args.json = true;
    } else if (arg === '--account' || arg === '--calendly-key') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        return undefined;
      }
      if (arg === '--account') {
        args.accountEmail = value;
      } else {
        args.calendlyKey = value;
      }
      i++;
    } else {
      words.push(arg);
    }
  }

  args.text = words.join(' ').trim();
  return args.text ? args : undefined;
}
