import { View, Text, StyleSheet } from "react-native";
import Card from "./Card";
import { Icon } from "./Icon";
import { chartTypes } from "../lib/chartTypes";
import type { ChartType } from "../lib/chartTypes";
import { colors } from "../theme/colors";
import { iconSize, type } from "../theme/typography";

export function ChartExplanation({ chart, compact = false }: { chart: ChartType; compact?: boolean }) {
  const info = chartTypes[chart];
  return (
    <Card variant="muted" size={compact ? "compact" : "regular"} style={compact ? styles.wrapCompact : styles.wrap}>
      <View style={styles.header}>
        <Icon name={info.icon} size={compact ? 12 : iconSize.inline} color={colors.accent} />
        <Text style={styles.title}>{info.title}</Text>
        <View style={{ flex: 1 }} />
        {!compact && <Text style={styles.info}>ⓘ</Text>}
      </View>
      {!compact && (
        <Text style={styles.description} numberOfLines={2}>
          {info.description}
        </Text>
      )}
    </Card>
  );
}

const styles = StyleSheet.create({
  wrap: { gap: 8 },
  wrapCompact: { gap: 4 },
  header: {
    flexDirection: "row",
    alignItems: "center",
    gap: 6,
  },
  title: {
    color: colors.textPrimary,
    fontSize: type.caption,
    fontWeight: "500",
  },
  info: {
    color: colors.textSecondary,
    fontSize: type.caption2,
  },
  description: {
    color: colors.textSecondary,
    fontSize: type.caption2,
  },
});
