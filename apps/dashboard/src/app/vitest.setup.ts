import { setLogLevel } from "@/lib/logger";

setLogLevel("silent");
