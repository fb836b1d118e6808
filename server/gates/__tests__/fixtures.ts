import { createQdac2, type Qdac2, type Qdac2Options } from '../../devices/drivers/qdac2.js';
import { createMockTransport, type MockTransport, type MockTransportOptions } from '../../devices/__tests__/mock-transport.js';

export interface ConnectedQdac {
  qdac: Qdac2;
  transport: MockTransport;
}

/**
 * An open QDAC-II on a recording transport. Line frequency is high so that
 * current measurements only wait a few milliseconds.
 */
export async function connectedQdac(
  options: Partial<Qdac2Options> = {},
  transportOptions: MockTransportOptions = {}
): Promise<ConnectedQdac> {
  const transport = createMockTransport(transportOptions);
  const qdac = createQdac2(transport, {
    name: 'dac',
    channelCount: 24,
    triggerCount: 16,
    lineFrequencyHz: 1000,
    trace: false,
    ...options,
  });
  await qdac.connect();
  return { qdac, transport };
}
