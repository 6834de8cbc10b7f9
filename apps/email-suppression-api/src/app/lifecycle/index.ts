export { type CreateStartHooksFn, createStartHooks, truncateOcid } from "./start"
export { type CreateStopHooksFn, createStopHooks } from "./stop"
