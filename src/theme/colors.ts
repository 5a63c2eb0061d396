export const colors = {
  background: "#FFFFFF",
  surface: "#FFFFFF",
  surfaceMuted: "#F3F4F6",
  surfaceBorder: "rgba(0,0,0,0.08)",
  surfaceBorderStrong: "rgba(0,0,0,0.12)",
  textPrimary: "#0B0C10",
  textSecondary: "#4B5563",
  textMuted: "#6B7280",
  accent: "#1F6FEB",
  link: "#2563EB",
  success: "#10B981",
  ringRed: "#ef4444",
  ringAmber: "#f59e0b",
  ringMint: "#10B981",
  // UI action palette
  buy: "#16a34a", // green
  sell: "#ef4444", // red
  neutral: "#6b7280", // gray
  demo: "#f97316", // orange
} as const;

// Semantic names used by chart legends and tooltips
export const namedColors = {
  green: colors.buy,
  red: colors.sell,
  blue: colors.accent,
  orange: colors.demo,
  gray: colors.neutral,
  secondary: colors.textSecondary,
} as const;

export type NamedColor = keyof typeof namedColors;
export type RgbaColor = `rgba(${string})`;
export type ColorValue = NamedColor | RgbaColor | `#${string}`;

export function isNamedColor(value: string): value is NamedColor {
  return Object.prototype.hasOwnProperty.call(namedColors, value);
}

export function resolveColor(value: ColorValue): string {
  return isNamedColor(value) ? namedColors[value] : value;
}

// "#1F6FEB" + 0.6 -> "rgba(31,111,235,0.6)"
export function withOpacity(value: ColorValue, alpha: number): RgbaColor {
  const hex = resolveColor(value);
  const m = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!m) throw new RangeError(`withOpacity expects a 6-digit hex color, got "${hex}"`);
  const [r, g, b] = [m[1], m[2], m[3]].map((h) => parseInt(h, 16));
  const a = Math.min(1, Math.max(0, alpha));
  return `rgba(${r},${g},${b},${a})`;
}
