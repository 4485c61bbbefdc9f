import { runPlugin } from "@plughost/sdk";
import { createMemoryMonitor } from "./plugin.js";

runPlugin(createMemoryMonitor());
