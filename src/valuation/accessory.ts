// Matched as substrings of the lowercased title, so "briefcase" hits "case"
export const ACCESSORY_KEYWORDS: readonly string[] = [
  'case',
  'charger',
  'cable',
  'screen protector',
  'protector',
  'adapter',
  'dock',
  'stand',
  'mount',
  'holder',
  'skin',
  'cover',
  'glass',
  'tempered',
  'wallet',
  'strap',
  'band',
  'cord',
  'hub',
  'battery',
  'power bank',
  'charging pad',
];

export function isAccessory(title: string): boolean {
  const t = title.toLowerCase();
  return ACCESSORY_KEYWORDS.some((kw) => t.includes(kw));
}
