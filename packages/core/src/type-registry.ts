// src/type-registry.ts
// Short codes for common host slot types, used in compact catalog listings

export const TYPE_SHORTHANDS: Readonly<Record<string, string>> = {
  MODEL: 'M',
  IMAGE: 'G',
  CONDITIONING: 'C',
  LATENT: 'A',
  VAE: 'V',
  CLIP: 'P',
  STRING: 'S',
  INT: 'I',
  FLOAT: 'F',
  BOOLEAN: 'B',
  MASK: 'K',
  CONTROL_NET: 'T',
  COMBO: 'L',
  CLIP_VISION: 'CV',
  CLIP_VISION_OUTPUT: 'CO',
  '*': '*',
};

/** Shorthand for a type name; unknown types are returned unchanged. */
export function shortType(name: string): string {
  return TYPE_SHORTHANDS[name] ?? name;
}

/** One legend line per shorthand, sorted by type name. */
export function shorthandLegend(): string[] {
  return Object.keys(TYPE_SHORTHANDS)
    .filter((name) => name !== '*')
    .sort()
    .map((name) => `${shortType(name)}=${name}`);
}
