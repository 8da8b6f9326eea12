export * from "./json/JsonValue.js";
export * from "./json/JsonRepair.js";
export * from "./logging/EventLogger.js";
