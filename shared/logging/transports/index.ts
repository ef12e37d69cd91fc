export { ConsoleTransport, type ConsoleTransportOptions } from './ConsoleTransport.ts';
export { MemoryTransport, type MemoryTransportOptions } from './MemoryTransport.ts';
