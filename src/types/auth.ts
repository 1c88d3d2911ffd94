/**
 * Actor Types
 */

/**
 * Actor Context - Who is performing the action
 * Every administrative service method receives this context
 */
export interface ActorContext {
  type: 'admin' | 'viewer' | 'system' | 'anonymous';
  /** Operator subject from the access token */
  operatorId?: string;
  requestId: string;
  ip?: string;
  userAgent?: string;
}

/**
 * System actor for startup tasks and scripts
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
};
