import { ConfigurationError, InvalidRequestError } from "../../src/core/errors/errors";
import { resolveRuntimeConfig } from "../config/runtime.config";
import { createRuntimeComponents } from "../provisioning/runtime_components";
import { parseRecommendLocalArgs } from "./recommend_local.args";

function rootCause(error: unknown): unknown {
  let current = error;
  while (!(current instanceof ConfigurationError) && !(current instanceof InvalidRequestError)) {
    if (!(current instanceof Error) || current.cause === undefined) {
      return error;
    }
    current = current.cause;
  }
  return current;
}

try {
  const args = parseRecommendLocalArgs(process.argv.slice(2));
  const config = resolveRuntimeConfig(
    {
      sessionBackend: args.sessionBackend,
      sqlitePath: args.sqlitePath,
      catalogPath: args.catalogPath,
      taxonomyPath: args.taxonomyPath,
    },
    process.env
  );
  console.log(
    `mode=local backend=${config.sessionBackend} session=${args.sessionId} n=${args.n} lang=${args.language ?? "ANY"}`
  );

  const components = createRuntimeComponents(config);
  try {
    const service = await components.get("service");
    if (args.showHistory) {
      const session = await service.getSessionHistory(args.sessionId);
      console.log(JSON.stringify(session, null, 2));
    } else {
      const outcome = await service.recommend({
        sessionId: args.sessionId,
        userQuery: args.query,
        n: args.n,
        language: args.language,
        explicitExclusions: args.exclusions,
      });
      console.log("----- result -----");
      console.log(JSON.stringify(outcome.result, null, 2));
      console.log(
        `tier=${outcome.result.tierUsed} items=${outcome.result.items.length} recorded=${outcome.recorded}`
      );
    }
  } finally {
    await components.shutdown();
  }
} catch (error) {
  const cause = rootCause(error);
  if (cause instanceof ConfigurationError) {
    console.error(`recommend:local configuration error: ${cause.message}`);
  } else if (cause instanceof InvalidRequestError) {
    console.error(`recommend:local invalid request: ${cause.message}`);
  } else {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`recommend:local failed: ${message}`);
  }
  process.exitCode = 1;
}
