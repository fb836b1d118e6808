/**
 * Environment configuration
 *
 *   QDAC_LINE_FREQUENCY_HZ - Mains frequency used for current integration (default: 50)
 *   QDAC_TRIGGER_COUNT     - Internal triggers per instrument (default: 16)
 *   QDAC_CHANNEL_COUNT     - Output channels per instrument (default: 24)
 *   QDAC_SERIAL_BAUD       - Serial baud rate (default: 921600)
 *   QDAC_COMMAND_DELAY_MS  - Delay after each serial command (default: 0)
 *   QDAC_TIMEOUT_MS        - Serial query timeout (default: 2000)
 *   GATEBENCH_TRACE        - Log every command sent to an instrument (default: off)
 *   SIM_LATENCY_MS         - Simulated transport latency (default: 0)
 *   SIM_LEAKAGE_OHM        - Simulated channel-to-ground resistance (default: 1e9)
 *
 * Options passed to the factories always win over these.
 */

export interface GatebenchConfig {
  lineFrequencyHz: number;
  triggerCount: number;
  channelCount: number;
  serialBaud: number;
  commandDelayMs: number;
  timeoutMs: number;
  trace: boolean;
  simLatencyMs: number;
  simLeakageOhm: number;
}

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined, defaultVal: number): number {
  if (!value) return defaultVal;
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? defaultVal : parsed;
}

function parseInteger(value: string | undefined, defaultVal: number): number {
  if (!value) return defaultVal;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 1 ? defaultVal : parsed;
}

function parseFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'on', 'yes'].includes(value.trim().toLowerCase());
}

export function loadConfigFromEnv(env: Env = process.env): GatebenchConfig {
  return {
    lineFrequencyHz: parseNumber(env.QDAC_LINE_FREQUENCY_HZ, 50),
    triggerCount: parseInteger(env.QDAC_TRIGGER_COUNT, 16),
    channelCount: parseInteger(env.QDAC_CHANNEL_COUNT, 24),
    serialBaud: parseInteger(env.QDAC_SERIAL_BAUD, 921600),
    commandDelayMs: parseNumber(env.QDAC_COMMAND_DELAY_MS, 0),
    timeoutMs: parseNumber(env.QDAC_TIMEOUT_MS, 2000),
    trace: parseFlag(env.GATEBENCH_TRACE),
    simLatencyMs: parseNumber(env.SIM_LATENCY_MS, 0),
    simLeakageOhm: parseNumber(env.SIM_LEAKAGE_OHM, 1e9),
  };
}
