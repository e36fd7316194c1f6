import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Subject } from 'rxjs';
import { HierarchicalHomiePublisher, SubjectHomiePublisher } from '../src/lib/hierarchical-homie-publisher';
import type { MqttMessage } from '../src/lib/interfaces';
import { PublisherFake } from './publisher-fake';

describe('HierarchicalHomiePublisher', () => {
    it('builds the topic from the parent segments', () => {
        const root = new PublisherFake();
        const device = new HierarchicalHomiePublisher(root, 'device');
        const node = new HierarchicalHomiePublisher(device, 'node');

        assert.deepEqual(node.topic(), ['device', 'node']);
        assert.deepEqual(device.topic(), ['device']);
    });

    it('publishes attributes below its own topic', () => {
        const root = new PublisherFake();
        const node = new HierarchicalHomiePublisher(new HierarchicalHomiePublisher(root, 'device'), 'node');

        node.publishMessage({suffix: '$name', payload: 'Living room'});
        node.publishMessage({payload: '42', retained: false});

        assert.deepEqual(root.messagePairs, [
            ['device/node/$name', 'Living room', true],
            ['device/node', '42', false]
        ]);
    });

    it('emits messages on the subject at the root', () => {
        const messages: Array<MqttMessage> = [];
        const subject = new Subject<MqttMessage>();
        subject.subscribe(msg => messages.push(msg));
        const publisher = new HierarchicalHomiePublisher(new SubjectHomiePublisher(subject), 'device');

        publisher.publishMessage({suffix: '$state', payload: 'ready'});
        publisher.publishMessage({payload: 'x', retained: false});

        assert.deepEqual(messages, [
            {topic: 'device/$state', message: 'ready', noRetain: false},
            {topic: 'device', message: 'x', noRetain: true}
        ]);
    });
});
