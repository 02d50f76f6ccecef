export {
  FakeEncoder,
  FakeEncoderProcess,
  succeedInstantly,
  failWithCode,
  exitCleanlyWithoutOutput,
  runUntilKilled,
  ignoreSigterm,
  type FakeBehaviour,
} from './fakeEncoder.js';
