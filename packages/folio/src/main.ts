/**
 * termfolio entry point.
 *
 *   termfolio            run in this terminal
 *   termfolio --serve    serve every SSH client its own session
 */

import { resolve } from "node:path";
import { ConfigError, createLogger, errorMessage } from "termfolio-core";
import { USAGE, loadAppConfig, parseCliArgs, resolveColorLevel } from "./config.js";
import { FileContentProvider } from "./content/provider.js";
import { runLocal } from "./session/local.js";
import { PortfolioSshServer } from "./session/ssh-server.js";
import { PortfolioApp } from "./ui/app.js";

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadAppConfig(args, process.env);
  const logger = createLogger("termfolio", {
    filePath: config.logFile,
    stderr: config.mode === "serve",
    debug: config.debug,
  });

  const contentDir = resolve(config.contentDir);
  const content = new FileContentProvider({ contentDir, logger });
  logger.info(
    `Content from ${contentDir}: ${content.listPosts().length} posts, ${content.listProjects().length} projects`
  );

  const colorLevel = resolveColorLevel(config, process.env);
  const createApp = () =>
    new PortfolioApp({ content, title: config.title, colorLevel, clock: config.clock, logger });

  if (config.mode === "local") {
    await runLocal({ app: createApp(), clock: config.clock, logger });
    return;
  }

  const server = new PortfolioSshServer({
    host: config.host,
    port: config.port,
    hostKeyPath: resolve(config.hostKeyPath),
    maxSessions: config.maxSessions,
    clock: config.clock,
    createApp,
    logger,
  });
  await server.listen();

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    await server.close();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err) => {
      logger.error(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(`[termfolio] ${err.message}\nRun with --help for usage.`);
  } else {
    console.error(`[termfolio] fatal: ${errorMessage(err)}`);
  }
  process.exit(1);
});
