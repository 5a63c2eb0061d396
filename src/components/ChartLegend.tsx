import { View, Text, StyleSheet } from "react-native";
import Card from "./Card";
import { Icon } from "./Icon";
import type { LegendEntry, LegendSet } from "../lib/legends";
import { colors, resolveColor } from "../theme/colors";
import { spacing } from "../theme/spacing";
import { iconSize, type } from "../theme/typography";
import { columnsToSpan, spanToPercent } from "../theme/grid";

const COLUMN_WIDTH = spanToPercent(columnsToSpan(2));

export function ChartLegend({ legend }: { legend: LegendSet }) {
  return (
    <Card variant="muted" style={styles.wrap}>
      {legend.title ? <Text style={styles.title}>{legend.title}</Text> : null}
      <View style={styles.grid}>
        {legend.entries.map((entry) => (
          <LegendItem key={entry.id} entry={entry} />
        ))}
      </View>
    </Card>
  );
}

function LegendItem({ entry }: { entry: LegendEntry }) {
  const { indicator } = entry;
  return (
    <View style={styles.item}>
      {indicator.kind === "color" ? (
        <View
          testID={`legend-dot-${entry.id}`}
          style={[styles.dot, { backgroundColor: resolveColor(indicator.color) }]}
        />
      ) : (
        <Icon testID={`legend-icon-${entry.id}`} name={indicator.icon} size={iconSize.legend} />
      )}
      <Text style={styles.label} numberOfLines={1}>
        {entry.label}
      </Text>
    </View>
  );
}

const styles = StyleSheet.create({
  wrap: {
    gap: spacing.sm,
  },
  title: {
    color: colors.textSecondary,
    fontSize: type.caption,
    fontWeight: "500",
  },
  grid: {
    flexDirection: "row",
    flexWrap: "wrap",
    rowGap: spacing.sm,
  },
  item: {
    width: COLUMN_WIDTH,
    flexDirection: "row",
    alignItems: "center",
    gap: 6,
  },
  dot: {
    width: iconSize.dot,
    height: iconSize.dot,
    borderRadius: iconSize.dot / 2,
  },
  label: {
    flexShrink: 1,
    color: colors.textSecondary,
    fontSize: type.caption2,
  },
});
