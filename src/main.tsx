import { AppRegistry } from "react-native";
import App from "./App";

const rootTag = document.getElementById("root");
if (!rootTag) throw new Error("Missing #root element");

AppRegistry.registerComponent("TradingChartKit", () => App);
AppRegistry.runApplication("TradingChartKit", { rootTag });
