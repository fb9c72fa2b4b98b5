export { FakeSolver, fixedIdentity, steppingClock } from './fakes.js';
