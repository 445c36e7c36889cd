// Keep test output quiet: diagnostics still reach the log store and any test sinks.
process.env.URDF_LOG_CONSOLE = "false";
