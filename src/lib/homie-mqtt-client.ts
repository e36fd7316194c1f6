import * as mqtt from 'mqtt';
import { asyncScheduler, SchedulerLike, Subscription } from 'rxjs';
import { map } from 'rxjs/operators';
import { homieLogger } from '../logger';
import { loadMqttServerConfig } from '../settings';
import { IllegalStateError } from './errors';
import { HomieDevice } from './homie-device';
import { HomieMqttServerConfig, MqttClientLike, MqttConnector, MqttMessage } from './interfaces';

export const DEFAULT_HOMIE_ROOT = 'homie';

export interface HomieMqttClientOptions extends Partial<HomieMqttServerConfig> {
    brokerUrl: string;
    device: HomieDevice;
    connector?: MqttConnector;
    /** Scheduler for the `$stats` timer. */
    scheduler?: SchedulerLike;
}

const SET_SUFFIX = '/set';

export class HomieMqttClient {
    readonly device: HomieDevice;
    readonly homieRoot: string;

    private readonly config: HomieMqttServerConfig;
    private readonly connector: MqttConnector;
    private readonly scheduler: SchedulerLike;
    private client?: MqttClientLike;
    private outgoing?: Subscription;
    private stats?: Subscription;
    private disconnecting?: Promise<void>;

    static fromEnv(device: HomieDevice, env: NodeJS.ProcessEnv = process.env, connector?: MqttConnector): HomieMqttClient {
        return new HomieMqttClient({...loadMqttServerConfig(env), device, connector});
    }

    constructor(options: HomieMqttClientOptions) {
        this.device = options.device;
        this.homieRoot = options.homieRoot ?? DEFAULT_HOMIE_ROOT;
        this.connector = options.connector ?? mqtt.connect;
        this.scheduler = options.scheduler ?? asyncScheduler;
        this.config = {
            brokerUrl: options.brokerUrl,
            clientId: options.clientId,
            username: options.username,
            password: options.password,
            homieRoot: this.homieRoot,
            statsIntervalSeconds: options.statsIntervalSeconds ?? this.device.statsIntervalSeconds
        };
        this.device.statsIntervalSeconds = this.config.statsIntervalSeconds;
    }

    private get deviceTopic(): string {
        return `${this.homieRoot}/${this.device.id}`;
    }

    /**
     * Opens the connection. Resolves on the first `connect`, rejects on an error before that.
     * May only be called once per client.
     */
    connect(): Promise<void> {
        if (this.client) {
            throw new IllegalStateError(`Client for device ${this.device.id} is already connected`);
        }
        const deviceId = this.device.id;
        const client = this.connector(this.config.brokerUrl, {
            clientId: this.config.clientId,
            keepalive: 60,
            password: this.config.password,
            username: this.config.username,
            resubscribe: true,
            reconnectPeriod: 2000,
            will: {topic: `${this.deviceTopic}/$state`, payload: Buffer.from('lost'), qos: 1, retain: true}
        });
        this.client = client;

        this.outgoing = this.device.messagesToSend
            .pipe(
                map(msg => ({...msg, topic: `${this.homieRoot}/${msg.topic}`}))
            )
            .subscribe(msg => this.publish(client, msg));

        client.on('message', (topic: string, payload: Buffer) => {
            this.handleHomieMessage(topic, payload.toString());
        });
        client.on('reconnect', () => {
            homieLogger.info('Reconnecting', {device: deviceId});
        });
        client.on('close', () => {
            homieLogger.info('Connection closed', {device: deviceId});
        });

        return new Promise<void>((resolve, reject) => {
            let connected = false;
            client.on('connect', () => {
                homieLogger.info('Connected', {device: deviceId});
                this.subscribeToSetTopics(client);
                this.device.publishConfig();
                if (!connected) {
                    connected = true;
                    this.stats = this.device.startStats(this.scheduler);
                    resolve();
                }
            });
            client.on('error', (error: Error) => {
                homieLogger.error(`Connection error: ${error.message}`, {device: deviceId});
                if (!connected) {
                    reject(error);
                }
            });
        });
    }

    /**
     * Publishes `$state=disconnected` and closes the connection once it has been handed over.
     * Later calls return the same promise.
     */
    disconnect(): Promise<void> {
        const client = this.client;
        if (!client) {
            return Promise.resolve();
        }
        if (this.disconnecting) {
            return this.disconnecting;
        }
        this.stats?.unsubscribe();
        this.stats = undefined;
        this.device.disconnect();
        this.outgoing?.unsubscribe();
        this.outgoing = undefined;

        this.disconnecting = new Promise<void>(resolve => {
            client.end(false, () => {
                homieLogger.info('Disconnected', {device: this.device.id});
                resolve();
            });
        });

        return this.disconnecting;
    }

    private publish(client: MqttClientLike, msg: MqttMessage): void {
        homieLogger.silly(`Sending to ${msg.topic}: ${msg.message}`, {device: this.device.id});
        const opts: mqtt.IClientPublishOptions = {retain: !msg.noRetain, qos: 1};
        client.publish(msg.topic, msg.message, opts, error => {
            if (error) {
                homieLogger.error(`An error has occurred while sending a message to topic ${msg.topic}: ${error.message}`,
                    {device: this.device.id});
            }
        });
    }

    private subscribeToSetTopics(client: MqttClientLike): void {
        const setTopic = `${this.deviceTopic}/+/+${SET_SUFFIX}`;
        client.subscribe(setTopic, {qos: 1}, error => {
            if (error) {
                homieLogger.warn(`Could not subscribe to topic ${setTopic}: ${error.message}`, {device: this.device.id});
            } else {
                homieLogger.debug(`Subscribed to ${setTopic}`, {device: this.device.id});
            }
        });
    }

    private handleHomieMessage(topic: string, homieMsg: string): void {
        const rootPrefix = `${this.homieRoot}/`;
        if (!topic.startsWith(rootPrefix) || !topic.endsWith(SET_SUFFIX) || homieMsg === '') {
            return;
        }
        homieLogger.info(`homie set message received ${topic}, ${homieMsg}`, {device: this.device.id});
        const segments = topic
            .slice(rootPrefix.length, topic.length - SET_SUFFIX.length)
            .split('/');
        const property = this.device.findProperty(segments);
        if (!property) {
            homieLogger.warn(`No property for set message on topic ${topic}`, {device: this.device.id});

            return;
        }
        try {
            property.mqttReceived(homieMsg);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            homieLogger.warn(`Could not apply ${homieMsg} to ${property.topicSegments.join('/')}: ${reason}`,
                {device: this.device.id});
        }
    }
}
