/** `run_2024-05-01T09-30-12_k3f9`: sortable and safe in file names. */
export function runId(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const base =
    now.getFullYear() +
    "-" +
    pad(now.getMonth() + 1) +
    "-" +
    pad(now.getDate()) +
    "T" +
    pad(now.getHours()) +
    "-" +
    pad(now.getMinutes()) +
    "-" +
    pad(now.getSeconds());
  const rand = Math.random().toString(36).slice(2, 6);
  return "run_" + base + "_" + rand;
}
