import { loadSweepDotEnv } from "@archive-sweep/shared/dotenv";

export const dotEnv = loadSweepDotEnv();
