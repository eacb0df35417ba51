/**
 * Storage key for a family: lower-cased surname with spaces turned into
 * underscores and apostrophes removed. No other normalization is applied, so
 * "Müller" and "Muller" are different families.
 */
export function deriveFamilyKey(name: string): string {
  return name.toLowerCase().replace(/ /g, '_').replace(/'/g, '');
}

/**
 * Gallery labels are "First Last" or "Last"; the surname is the last
 * whitespace-delimited token. Multi-word surnames lose their leading words.
 */
export function surnameFromGallery(gallery: string): string {
  const parts = gallery.split(/\s+/).filter((part) => part.length > 0);
  return parts.length ? parts[parts.length - 1] : gallery;
}
