export { createFakeDelegatedRunner, type FakeDelegatedRunner } from './fake-delegated-runner.js';
export { createFakeProtocolClient, type FakeProtocolClient } from './fake-pdu.js';
export { createRecordingSleep, type RecordingSleep } from './recording-sleep.js';
export { createScriptedProbe, type ScriptedProbe } from './scripted-probe.js';
export { withTempFile } from './temp-utils.js';
export type { DelegatedCall, FakePduOptions, ProbeCall, ProtocolCall } from './types.js';
