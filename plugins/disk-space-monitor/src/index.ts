import { runPlugin } from "@plughost/sdk";
import { createDiskSpaceMonitor } from "./plugin.js";

runPlugin(createDiskSpaceMonitor());
