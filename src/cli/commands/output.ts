/**
 * Print a command failure as text, or as { error } with --json
 */
export function reportError(error: unknown, json?: boolean): void {
  const message = error instanceof Error ? error.message : 'Unknown error occurred';
  if (json) {
    console.log(JSON.stringify({ error: message }, null, 2));
  } else {
    console.error('❌ Error:', message);
  }
}
