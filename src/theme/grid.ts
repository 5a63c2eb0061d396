import { useWindowDimensions } from "react-native";

// Tailwind-like breakpoints in px
export const BREAKPOINTS = {
  sm: 0,      // default
  md: 768,    // tablets / small desktops
  lg: 1024,   // larger desktops
};

export type SpanConfig = { sm: number; md: number; lg: number };
export type Percent = `${number}%`;

// Returns the active span (1-12) for current width based on provided config
export function useResponsiveSpan(config: SpanConfig) {
  const { width } = useWindowDimensions();
  return spanForWidth(width, config);
}

export function spanForWidth(width: number, config: SpanConfig) {
  if (width >= BREAKPOINTS.lg) return clampSpan(config.lg);
  if (width >= BREAKPOINTS.md) return clampSpan(config.md);
  return clampSpan(config.sm);
}

export function spanToPercent(span: number): Percent {
  const s = clampSpan(span);
  const pct = Math.round((s / 12) * 100 * 100) / 100;
  return `${pct}%`;
}

// Span that fits `columns` equal cells into the 12-column grid
export function columnsToSpan(columns: number) {
  if (!Number.isFinite(columns) || columns <= 0) return 12;
  return clampSpan(12 / columns);
}

function clampSpan(span: number) {
  if (!Number.isFinite(span)) return 12;
  return Math.min(12, Math.max(1, Math.round(span)));
}
