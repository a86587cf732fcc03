export {
  createEngineFromEnv,
  type CreateEngineFromEnvOptions,
  type EngineBootstrap,
} from "./create-engine.ts";
export {
  buildSentryInitOptions,
  createNodeSentryBridge,
  initializeNodeSentry,
  resetNodeSentryForTests,
} from "./sentry-node.ts";
