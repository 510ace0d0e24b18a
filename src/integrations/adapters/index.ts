// Re-export the PMS backends from a single entry point.
export { MockPmsBackend, type RandomSource } from './mock-pms';
export { RemotePmsBackend } from './remote-pms';
