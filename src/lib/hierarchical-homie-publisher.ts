import { Subject } from 'rxjs';
import { HomiePublisher, MqttMessage } from './interfaces';

export interface PublishRequest {
    suffix?: string;
    payload: string;
    retained?: boolean;
}

/**
 * Root of a publisher hierarchy. Topics are relative to the Homie root, which is added by the
 * MQTT client when the message leaves the process.
 */
export class SubjectHomiePublisher implements HomiePublisher {
    constructor(private readonly messagesToSend: Subject<MqttMessage>) {
    }

    topic(): Array<string> {
        return [];
    }

    publish(topicSegments: Array<string>, payload: string, retained: boolean): void {
        this.messagesToSend.next({
            topic: topicSegments.join('/'),
            message: payload,
            noRetain: !retained
        });
    }
}

export class HierarchicalHomiePublisher implements HomiePublisher {

    constructor(private readonly parentPublisher: HomiePublisher,
                private readonly id: string) {
    }

    topic(): Array<string> {
        return [...this.parentPublisher.topic(), this.id];
    }

    publish(topicSegments: Array<string>, payload: string, retained: boolean): void {
        this.parentPublisher.publish([this.id, ...topicSegments], payload, retained);
    }

    publishMessage({suffix, payload, retained = true}: PublishRequest): void {
        this.publish(suffix === undefined ? [] : [suffix], payload, retained);
    }
}
