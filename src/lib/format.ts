// Number and time formatting shared by chart tooltips

export function fixed(n: number, digits = 2) {
  if (!Number.isFinite(n)) return "—";
  return n.toFixed(digits);
}

// Always carries a sign: 250 -> "+250.00", -3.5 -> "-3.50"
export function signed(n: number, digits = 2) {
  if (!Number.isFinite(n)) return "—";
  return `${n >= 0 ? "+" : ""}${n.toFixed(digits)}`;
}

export function formatVolume(volume: number) {
  if (!Number.isFinite(volume)) return "—";
  if (volume >= 1_000_000) return `${(volume / 1_000_000).toFixed(1)}M`;
  if (volume >= 1_000) return `${(volume / 1_000).toFixed(1)}K`;
  return volume.toFixed(0);
}

const pad2 = (n: number) => String(n).padStart(2, "0");
const toDate = (ts: Date | number) => (ts instanceof Date ? ts : new Date(ts));

// Local wall-clock time, "HH:mm"
export function formatTime(ts: Date | number) {
  const d = toDate(ts);
  return `${pad2(d.getHours())}:${pad2(d.getMinutes())}`;
}

// Local short date and time, "MM/DD/YY HH:mm"
export function formatDateTime(ts: Date | number) {
  const d = toDate(ts);
  const date = `${pad2(d.getMonth() + 1)}/${pad2(d.getDate())}/${pad2(d.getFullYear() % 100)}`;
  return `${date} ${formatTime(d)}`;
}
