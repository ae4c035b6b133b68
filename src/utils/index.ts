export { log, spinner } from "./logger.js";
