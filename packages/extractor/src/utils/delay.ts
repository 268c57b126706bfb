/**
 * Resolve after the given number of milliseconds
 */
export async function delay(ms: number): Promise<void> {
  if (ms <= 0) {
    return;
  }
  return new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}
