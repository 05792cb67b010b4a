/** 0x-prefixed, at least three digits: 0x00a */
export function formatHex(n: number): string {
  return `0x${n.toString(16).padStart(3, '0')}`;
}
