import { View, Text, Pressable, StyleSheet } from "react-native";
import { colors } from "../theme/colors";
import { spacing } from "../theme/spacing";
import { type } from "../theme/typography";

export function SegmentedPicker({
  options,
  selected,
  onSelect,
}: {
  options: readonly string[];
  selected: number;
  onSelect: (index: number) => void;
}) {
  return (
    <View style={styles.row} accessibilityRole="tablist">
      {options.map((label, i) => (
        <Pressable
          key={label}
          accessibilityRole="tab"
          accessibilityState={{ selected: i === selected }}
          onPress={() => onSelect(i)}
          style={[styles.segment, i === selected && styles.segmentEm]}
        >
          <Text style={[styles.segmentText, i === selected && styles.segmentTextEm]}>{label}</Text>
        </Pressable>
      ))}
    </View>
  );
}

const styles = StyleSheet.create({
  row: {
    flexDirection: "row",
    backgroundColor: colors.surfaceMuted,
    borderRadius: 9,
    padding: 2,
    gap: 2,
  },
  segment: {
    flex: 1,
    alignItems: "center",
    paddingVertical: 6,
    paddingHorizontal: spacing.xs,
    borderRadius: 7,
  },
  segmentEm: {
    backgroundColor: colors.surface,
    borderWidth: 1,
    borderColor: colors.surfaceBorderStrong,
  },
  segmentText: {
    color: colors.textSecondary,
    fontSize: type.caption,
    fontWeight: "600",
  },
  segmentTextEm: {
    color: colors.textPrimary,
  },
});
