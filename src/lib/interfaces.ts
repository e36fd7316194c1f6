import * as mqtt from 'mqtt';

export interface MqttMessage {
    topic: string;
    message: string;
    noRetain?: boolean;
}

export interface MqttServerConfig {
    brokerUrl: string;
    username?: string;
    password?: string;
}

export interface HomieMqttServerConfig extends MqttServerConfig {
    clientId?: string;
    homieRoot: string;
    statsIntervalSeconds: number;
}

export type DeviceState = 'init' | 'ready' | 'disconnected' | 'lost';

export type HomieDatatype = 'string' | 'integer' | 'float' | 'boolean' | 'enum' | 'color';

/**
 * Anything that accepts messages addressed by topic segments. The root of a hierarchy joins the
 * segments into a topic and hands the message to the transport.
 */
export interface HomiePublisher {
    topic(): Array<string>;

    publish(topicSegments: Array<string>, payload: string, retained: boolean): void;
}

export interface HomieUnit {
    publishConfig(): void;
}

export interface PropertyUpdate<T> {
    property: HomieProperty<T>;
    update: T;
}

export type PropertyObserver<T> = (update: PropertyUpdate<T>) => void;

export interface HomieProperty<T> extends HomieUnit {
    readonly id: string;
    readonly name?: string;
    readonly settable: boolean;
    readonly retained: boolean;
    readonly unit?: string;
    readonly datatype: HomieDatatype;
    readonly format?: string;
    readonly topicSegments: Array<string>;

    update(value: T): void;

    subscribe(observer: PropertyObserver<T>): HomieProperty<T>;

    /**
     * Entry point for the transport when a message arrives on `<property topic>/set`.
     */
    mqttReceived(payload: string): void;
}

export interface PropertyOptions {
    id: string;
    name?: string;
    retained?: boolean;
    unit?: string;
}

export interface NumberRange {
    min: number;
    max: number;
}

export interface NumberPropertyOptions extends PropertyOptions {
    range?: NumberRange;
}

export interface EnumPropertyOptions<E> extends PropertyOptions {
    /** Wire value to domain value pairs, in the order the values are announced in `$format`. */
    mapping: Iterable<readonly [string, E]>;
}

export interface NodeOptions {
    id: string;
    type: string;
    name?: string;
}

export interface DeviceOptions {
    id: string;
    name: string;
}

/**
 * The part of `mqtt.MqttClient` the Homie client relies on.
 */
export interface MqttClientLike {
    publish(topic: string, message: string, opts: mqtt.IClientPublishOptions, callback?: (error?: Error) => void): unknown;

    subscribe(topic: string, opts: mqtt.IClientSubscribeOptions, callback?: (error: Error | null) => void): unknown;

    end(force: boolean, callback: () => void): unknown;

    on(event: 'message', listener: (topic: string, payload: Buffer) => void): unknown;

    on(event: 'error', listener: (error: Error) => void): unknown;

    on(event: 'connect' | 'reconnect' | 'close', listener: () => void): unknown;
}

export type MqttConnector = (brokerUrl: string, options: mqtt.IClientOptions) => MqttClientLike;
