import { runPlugin } from "@plughost/sdk";
import { createEmailNotification } from "./plugin.js";

runPlugin(createEmailNotification());
