export { EventBus } from './EventBus';
export type { EventCallback } from './EventBus';
