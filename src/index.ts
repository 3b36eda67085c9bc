import 'dotenv/config';

if (process.env.PORT) {
  // Server mode
  const { startServer } = await import('./server.js');
  startServer();
} else {
  // One-shot mode — queries from the command line, or the defaults
  const { config } = await import('./config.js');
  const { runPipeline } = await import('./pipeline.js');
  const queries = config.CLI_QUERIES.length ? config.CLI_QUERIES : config.DEFAULT_QUERIES;
  try {
    await runPipeline({ queries, maxResults: config.MAX_RESULTS });
    process.exit(0);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
