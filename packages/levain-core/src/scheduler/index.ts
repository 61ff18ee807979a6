export {
  isFeedingDue,
  blendHydration,
  dilutedSalt,
  applyFeeding,
  maybeApplyFeeding,
  FEEDING_EPSILON,
} from './feeding-scheduler.js';
