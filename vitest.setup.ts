// Keep demo logs out of test output and make step delays instant.
process.env.LOG_LEVEL = "silent";
process.env.KRUSKAL_STEP_DELAY_MS = "0";
