import { View, Text, StyleSheet } from "react-native";
import Card from "./Card";
import type { TooltipData } from "../lib/tooltips";
import { colors, resolveColor } from "../theme/colors";
import { type } from "../theme/typography";

export type TooltipPosition = { x: number; y: number };

export function ChartTooltip({
  data,
  position,
  visible,
}: {
  data: TooltipData;
  position: TooltipPosition;
  visible: boolean;
}) {
  if (!visible) return null;
  return (
    <Card size="compact" style={[styles.wrap, { left: position.x, top: position.y }]}>
      <Text style={styles.title}>{data.title}</Text>
      {data.values.map((v) => (
        <View key={v.label} style={styles.row}>
          <Text style={styles.label}>{v.label}</Text>
          <Text style={[styles.value, { color: v.color ? resolveColor(v.color) : colors.textPrimary }]}>
            {v.value}
          </Text>
        </View>
      ))}
    </Card>
  );
}

const styles = StyleSheet.create({
  wrap: {
    position: "absolute",
    minWidth: 140,
    gap: 4,
    zIndex: 10,
  },
  title: {
    color: colors.textPrimary,
    fontSize: type.caption,
    fontWeight: "600",
  },
  row: {
    flexDirection: "row",
    justifyContent: "space-between",
    gap: 12,
  },
  label: {
    color: colors.textSecondary,
    fontSize: type.caption2,
  },
  value: {
    fontSize: type.caption2,
    fontWeight: "500",
  },
});
