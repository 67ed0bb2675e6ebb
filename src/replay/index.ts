export { ReplayClock, replayEvents, type ReplayOptions } from './replayEvents';
