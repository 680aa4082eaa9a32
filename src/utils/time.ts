export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function elapsedMs(startedAt: number): number {
  return Date.now() - startedAt;
}
