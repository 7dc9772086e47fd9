export { createApp, listen, type PdfdexServer, type ServerOptions } from "./server.js";
export { createApiRouter, ENDPOINTS } from "./routes/api.js";
export { startServer, handleSignals, type RunningServer } from "./startServer.js";
