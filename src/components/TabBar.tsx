import { View, Text, Pressable, StyleSheet, Platform } from "react-native";
import { Icon } from "./Icon";
import type { IconName } from "../theme/icons";
import { colors } from "../theme/colors";
import { spacing } from "../theme/spacing";
import { iconSize, type } from "../theme/typography";

export type TabItemSpec<K extends string> = { key: K; label: string; icon: IconName };

export function TabBar<K extends string>({
  items,
  active,
  onChange,
}: {
  items: ReadonlyArray<TabItemSpec<K>>;
  active: K;
  onChange: (key: K) => void;
}) {
  return (
    <View style={styles.tabBar}>
      {items.map((item) => (
        <TabItem
          key={item.key}
          label={item.label}
          icon={item.icon}
          active={item.key === active}
          onPress={() => onChange(item.key)}
        />
      ))}
    </View>
  );
}

function TabItem({
  label,
  icon,
  active,
  onPress,
}: {
  label: string;
  icon: IconName;
  active: boolean;
  onPress: () => void;
}) {
  return (
    <Pressable
      accessibilityRole="tab"
      accessibilityState={{ selected: active }}
      onPress={onPress}
      style={[styles.tabItem, active && styles.tabItemActive]}
    >
      <Icon name={icon} size={iconSize.inline} color={active ? colors.accent : colors.neutral} />
      <Text style={[styles.tabItemText, active && styles.tabItemTextActive]}>{label}</Text>
    </Pressable>
  );
}

const styles = StyleSheet.create({
  tabBar: {
    position: "absolute",
    left: 0,
    right: 0,
    bottom: 0,
    marginHorizontal: spacing.md,
    marginBottom: spacing.sm,
    backgroundColor: colors.surface,
    borderRadius: 22,
    flexDirection: "row",
    padding: spacing.xs,
    borderWidth: 1,
    borderColor: colors.surfaceBorder,
    zIndex: 1000,
    ...(Platform.OS !== "web"
      ? {
          shadowColor: "#000",
          shadowOpacity: 0.25,
          shadowRadius: 12,
          shadowOffset: { width: 0, height: 8 },
        }
      : {}),
  },
  tabItem: {
    flex: 1,
    alignItems: "center",
    paddingVertical: 10,
    borderRadius: 16,
    gap: 2,
  },
  tabItemActive: {
    backgroundColor: colors.accent + "15",
  },
  tabItemText: {
    color: colors.neutral,
    fontSize: type.caption2,
    fontWeight: "800",
  },
  tabItemTextActive: {
    color: colors.textPrimary,
  },
});
