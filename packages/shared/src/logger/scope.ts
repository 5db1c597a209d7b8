export function formatBindings(bindings: Record<string, unknown>): string {
  return Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
}

export function withPrefix(bindings: Record<string, unknown>, message: string): string {
  const prefix = formatBindings(bindings);
  return prefix ? `[${prefix}] ${message}` : message;
}
