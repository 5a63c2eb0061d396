import { useState } from "react";
import { View, StyleSheet } from "react-native";
import { TabBar } from "../components/TabBar";
import type { TabItemSpec } from "../components/TabBar";
import { ChartLegendScreen } from "../screens/ChartLegendScreen";
import { TradingButtonsScreen } from "../screens/TradingButtonsScreen";
import { EmptyStatePreviewScreen } from "../screens/EmptyStatePreviewScreen";
import { TabIconPreviewScreen } from "../screens/TabIconPreviewScreen";
import { colors } from "../theme/colors";

export type Route = "legends" | "trading" | "empty" | "tabs";

export const routes: ReadonlyArray<TabItemSpec<Route>> = [
  { key: "legends", label: "Charts", icon: "chart.bar" },
  { key: "trading", label: "Trade", icon: "arrow.up.arrow.down" },
  { key: "empty", label: "Empty", icon: "list.bullet.rectangle" },
  { key: "tabs", label: "Icons", icon: "gearshape" },
];

function RouteScreen({ route }: { route: Route }) {
  switch (route) {
    case "legends":
      return <ChartLegendScreen />;
    case "trading":
      return <TradingButtonsScreen />;
    case "empty":
      return <EmptyStatePreviewScreen />;
    case "tabs":
      return <TabIconPreviewScreen />;
  }
}

export default function RootNavigator() {
  const [route, setRoute] = useState<Route>("legends");

  return (
    <View style={styles.container}>
      <View style={styles.content}>
        <RouteScreen route={route} />
      </View>
      <TabBar items={routes} active={route} onChange={setRoute} />
    </View>
  );
}

const styles = StyleSheet.create({
  container: { flex: 1, backgroundColor: colors.background, position: "relative" },
  content: { flex: 1 },
});
