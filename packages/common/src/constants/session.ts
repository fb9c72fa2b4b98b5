export const SessionMode = {
  STAGING: 'staging',
  PRODUCTION: 'production',
} as const;

export type SessionMode = (typeof SessionMode)[keyof typeof SessionMode];
