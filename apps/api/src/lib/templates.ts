export type TemplateValues = Record<string, string | number>;

const PLACEHOLDER = /\{([a-z_]+)\}/g;

export function interpolate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER, (match, key: string) => {
    const value = values[key];
    return value === undefined ? match : String(value);
  });
}

// Counts code points so a cut never splits a surrogate pair.
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) {
    return text;
  }
  return `${chars.slice(0, max).join("")}...`;
}
