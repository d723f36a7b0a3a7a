// Case-insensitive ordering used for every list the UI shows
export function compareKeys(left: string, right: string): number {
  const a = left.toLowerCase();
  const b = right.toLowerCase();
  return a < b ? -1 : a > b ? 1 : 0;
}
