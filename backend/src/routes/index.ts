export { createConfigRouter, toRuntimeConfig, renderConfigScript } from './config';
export type { RuntimeConfigPayload } from './config';
export { createSessionRouter } from './session';
export { createChatRouter } from './chat';
export { createHealthRouter } from './health';
export type { HealthInfo } from './health';
