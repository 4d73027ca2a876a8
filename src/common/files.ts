/** Filesystem-safe form of an account identifier, used in token file names. */
export function accountSlug(account: string): string {
  return account.trim().replace(/[^a-zA-Z0-9_.+-]+/g, '_');
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
