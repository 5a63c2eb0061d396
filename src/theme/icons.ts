// Symbolic icon tokens rendered as text glyphs on web
export const iconGlyphs = {
  "arrow.up.arrow.down": "⇅",
  "arrow.up.right": "↗",
  "arrow.up.circle.fill": "⬆",
  "arrow.down.circle.fill": "⬇",
  "chart.line.uptrend.xyaxis": "📈",
  "chart.bar": "📊",
  "chart.bar.fill": "▮",
  "circle.fill": "●",
  clock: "🕒",
  "dollarsign.circle": "💲",
  "list.bullet.rectangle": "📋",
  "brain.head.profile": "🧠",
  brain: "🧠",
  gearshape: "⚙",
  "antenna.radiowaves.left.and.right": "📡",
} as const;

export type IconName = keyof typeof iconGlyphs;

export function glyphFor(icon: IconName): string {
  return iconGlyphs[icon];
}
