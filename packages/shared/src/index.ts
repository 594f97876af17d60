export * from "./ids.js";
export * from "./jobs.js";
export * from "./notifications.js";
