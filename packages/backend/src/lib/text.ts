export function normalize_text(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

export function truncate(text: string, max_length: number): string {
  if (text.length <= max_length) return text;
  return text.slice(0, max_length - 3) + '...';
}
