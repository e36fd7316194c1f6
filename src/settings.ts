import { InvalidArgumentError } from './lib/errors';
import { HomieMqttServerConfig } from './lib/interfaces';

/**
 * Broker and Homie settings are read from the environment:
 *
 * - `MQTT_SERVER` broker url, e.g. `mqtt://localhost:1883` (required)
 * - `MQTT_CLIENT_ID`, `MQTT_USERNAME`, `MQTT_PASSWORD`
 * - `HOMIE_ROOT` base topic, defaults to `homie`
 * - `HOMIE_STATS_INTERVAL` seconds between `$stats/uptime` updates, defaults to 60
 */
export function loadMqttServerConfig(env: NodeJS.ProcessEnv = process.env): HomieMqttServerConfig {
    const brokerUrl = env.MQTT_SERVER;
    if (!brokerUrl) {
        throw new InvalidArgumentError('MQTT_SERVER is not set');
    }

    return {
        brokerUrl,
        clientId: env.MQTT_CLIENT_ID || undefined,
        username: env.MQTT_USERNAME || undefined,
        password: env.MQTT_PASSWORD || undefined,
        homieRoot: env.HOMIE_ROOT || 'homie',
        statsIntervalSeconds: parseStatsInterval(env.HOMIE_STATS_INTERVAL)
    };
}

function parseStatsInterval(value?: string): number {
    if (!value) {
        return 60;
    }
    const interval = Number(value);
    if (!Number.isInteger(interval) || interval <= 0) {
        throw new InvalidArgumentError(`HOMIE_STATS_INTERVAL must be a positive integer, got ${value}`);
    }

    return interval;
}
