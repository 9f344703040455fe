export { SessionSettings, SETTINGS_ENV, resolveSettings } from "./settings.js";
export type { SessionSettingsInput } from "./settings.js";
