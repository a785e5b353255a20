export const MODULE_IDS = Object.freeze({
  telemetry: 'Telemetry',
  cli: 'Cli',
});

export type ModuleId = (typeof MODULE_IDS)[keyof typeof MODULE_IDS];
