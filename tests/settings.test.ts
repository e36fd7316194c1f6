import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InvalidArgumentError } from '../src/lib/errors';
import { loadMqttServerConfig } from '../src/settings';

describe('loadMqttServerConfig', () => {
    it('reads all settings', () => {
        const config = loadMqttServerConfig({
            MQTT_SERVER: 'mqtt://broker.test:1883',
            MQTT_CLIENT_ID: 'test-client',
            MQTT_USERNAME: 'mqtt',
            MQTT_PASSWORD: 'test-secret',
            HOMIE_ROOT: 'devices',
            HOMIE_STATS_INTERVAL: '30'
        });

        assert.deepEqual(config, {
            brokerUrl: 'mqtt://broker.test:1883',
            clientId: 'test-client',
            username: 'mqtt',
            password: 'test-secret',
            homieRoot: 'devices',
            statsIntervalSeconds: 30
        });
    });

    it('falls back to defaults', () => {
        const config = loadMqttServerConfig({MQTT_SERVER: 'mqtt://broker.test'});

        assert.equal(config.homieRoot, 'homie');
        assert.equal(config.statsIntervalSeconds, 60);
        assert.equal(config.clientId, undefined);
        assert.equal(config.username, undefined);
    });

    it('requires a server', () => {
        assert.throws(() => loadMqttServerConfig({}), InvalidArgumentError);
    });

    it('rejects an invalid stats interval', () => {
        assert.throws(() => loadMqttServerConfig({MQTT_SERVER: 'mqtt://broker.test', HOMIE_STATS_INTERVAL: '0'}),
            /HOMIE_STATS_INTERVAL/);
        assert.throws(() => loadMqttServerConfig({MQTT_SERVER: 'mqtt://broker.test', HOMIE_STATS_INTERVAL: 'often'}),
            InvalidArgumentError);
    });
});
