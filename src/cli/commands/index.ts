export { validateCommand } from "./validate.js";
export { hookCommand } from "./hook.js";
export { schemasCommand } from "./schemas.js";
export {
    sessionInitCommand,
    sessionReadCommand,
    sessionUpdateCommand,
    sessionLockCommand,
    sessionUnlockCommand,
} from "./session.js";
export { cacheDiscoverCommand, cacheFetchCommand, cacheRefsCommand } from "./cache.js";
