export { assertPositive, isSanePrice } from "./guards.js";
export { isMainModule } from "./is-main.js";
export { parseEnv } from "./parse-env.js";
export { roundTo, floorTo } from "./round.js";
export { formatZodErrors } from "./zod-helpers.js";
