/** `run_20250728T080000Z_k3x9qa`: sortable by start time, unique across concurrent invocations. */
export function createRunId(now = new Date(), random: () => number = Math.random): string {
  const stamp = now.toISOString().replace(/\.\d{3}Z$/, "Z").replace(/[-:]/g, "");
  const suffix = random().toString(36).slice(2, 8).padEnd(6, "0");
  return `run_${stamp}_${suffix}`;
}
