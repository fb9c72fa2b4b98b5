import os from 'node:os';
import type { Clock, Identity } from '@scopepack/common';

export const systemIdentity: Identity = {
  currentUser: () => os.userInfo().username,
};

export const systemClock: Clock = {
  now: () => new Date(),
};
