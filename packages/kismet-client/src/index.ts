export { KismetClient, recentDevicesPath } from './client';
export { KismetClientError } from './errors';
export type { KismetClientErrorCode } from './errors';
export type {
  DeviceRecord,
  KismetClientOptions,
  KismetCredentials,
  RecentDevicesInput
} from './types';
