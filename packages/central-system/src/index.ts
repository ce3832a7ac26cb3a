export * from "./admin.js";
export * from "./admin-http.js";
export * from "./central-system.js";
export * from "./config.js";
export * from "./http-admin.js";
export * from "./mcp.js";
export * from "./registry.js";
