import { asyncScheduler, SchedulerLike, Subject, Subscription, timer } from 'rxjs';
import { homieLogger } from '../logger';
import { InvalidArgumentError } from './errors';
import { HierarchicalHomiePublisher, SubjectHomiePublisher } from './hierarchical-homie-publisher';
import { HomieNode } from './homie-node';
import { DeviceOptions, DeviceState, HomieProperty, HomiePublisher, HomieUnit, MqttMessage, NodeOptions } from './interfaces';

export const HOMIE_VERSION = '3.0.1';
export const DEFAULT_STATS_INTERVAL_SECONDS = 60;

export type NodeInit = (node: HomieNode) => void;

export class Device implements HomieUnit {
    readonly id: string;
    readonly name: string;
    currentState: DeviceState = 'init';
    statsIntervalSeconds = DEFAULT_STATS_INTERVAL_SECONDS;

    private readonly publisher: HierarchicalHomiePublisher;
    private readonly nodes = new Map<string, HomieNode>();

    constructor(options: DeviceOptions, parentPublisher: HomiePublisher) {
        this.id = options.id;
        this.name = options.name;
        this.publisher = new HierarchicalHomiePublisher(parentPublisher, options.id);
    }

    get topicSegments(): Array<string> {
        return this.publisher.topic();
    }

    getNode(nodeId: string): HomieNode | undefined {
        return this.nodes.get(nodeId);
    }

    nodeIds(): Array<string> {
        return [...this.nodes.keys()];
    }

    addNode(node: HomieNode, init?: NodeInit): HomieNode {
        if (this.nodes.has(node.id)) {
            throw new InvalidArgumentError(`Duplicate node id ${node.id} in device ${this.id}`);
        }
        init?.(node);
        this.nodes.set(node.id, node);
        homieLogger.debug(`Added node ${node.id} to device ${this.id}`);
        this.publishNodes();

        return node;
    }

    node(options: NodeOptions, init?: NodeInit): HomieNode {
        return this.addNode(new HomieNode(options, this.publisher), init);
    }

    /**
     * Resolves `[deviceId, nodeId, propertyId]` as found in a set topic below the Homie root.
     */
    findProperty(topicSegments: Array<string>): HomieProperty<unknown> | undefined {
        if (topicSegments.length !== 3 || topicSegments[0] !== this.id) {
            return undefined;
        }
        const [, nodeId, propertyId] = topicSegments;

        return this.nodes.get(nodeId)?.getProperty(propertyId);
    }

    changeDeviceState(desiredState: DeviceState): void {
        this.publisher.publishMessage({suffix: '$state', payload: desiredState});
        this.currentState = desiredState;
        homieLogger.info(`State changed to ${desiredState}`, {device: this.id});
    }

    publishConfig(): void {
        this.changeDeviceState('init');
        this.publisher.publishMessage({suffix: '$homie', payload: HOMIE_VERSION});
        this.publisher.publishMessage({suffix: '$name', payload: this.name});
        this.publishNodes();
        this.publisher.publishMessage({suffix: '$stats', payload: 'uptime'});
        this.publisher.publishMessage({suffix: '$stats/interval', payload: this.statsIntervalSeconds.toString(10)});
        this.nodes.forEach(node => node.publishConfig());
        this.changeDeviceState('ready');
    }

    disconnect(): void {
        this.changeDeviceState('disconnected');
    }

    /**
     * Publishes `$stats/uptime` now and then every `statsIntervalSeconds` until unsubscribed.
     */
    startStats(scheduler: SchedulerLike = asyncScheduler): Subscription {
        const firstSeen = scheduler.now();

        return timer(0, this.statsIntervalSeconds * 1000, scheduler)
            .subscribe(() => {
                homieLogger.silly('Updating stats', {device: this.id});
                const uptime = Math.floor((scheduler.now() - firstSeen) / 1000);
                this.publisher.publishMessage({suffix: '$stats/uptime', payload: uptime.toString(10)});
            });
    }

    private publishNodes(): void {
        this.publisher.publishMessage({suffix: '$nodes', payload: this.nodeIds().join(',')});
    }
}

/**
 * A device whose messages are emitted on `messagesToSend`, for a client to forward to the broker.
 */
export class HomieDevice extends Device {
    readonly messagesToSend: Subject<MqttMessage>;

    constructor(options: DeviceOptions, messagesToSend = new Subject<MqttMessage>()) {
        super(options, new SubjectHomiePublisher(messagesToSend));
        this.messagesToSend = messagesToSend;
    }
}

export function device(options: DeviceOptions, init?: (device: HomieDevice) => void): HomieDevice {
    const homieDevice = new HomieDevice(options);
    init?.(homieDevice);

    return homieDevice;
}
