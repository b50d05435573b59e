/** Replace every character that is not a letter, digit, '-' or '_' with '_'. */
export function sanitizeFileStem(value: string): string {
  return value.replace(/[^\p{L}\p{N}_-]/gu, '_');
}
