export function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  let cut = max - 3;
  // Never split a surrogate pair.
  const last = s.charCodeAt(cut - 1);
  if (last >= 0xd800 && last <= 0xdbff) cut -= 1;
  return s.slice(0, cut) + "...";
}
