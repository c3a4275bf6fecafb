export { SipaduAuthService, DEV_USER, USER_ID_PREFIX, toOverlayUserId } from './SipaduAuthService';
export type { SessionUser, SessionCheckResult, SipaduAuthOptions } from './SipaduAuthService';
export { QaServiceClient } from './QaServiceClient';
export type { QaServiceOptions } from './QaServiceClient';
