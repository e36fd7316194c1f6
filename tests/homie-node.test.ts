import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { HSV } from '../src/lib/color';
import { InvalidArgumentError } from '../src/lib/errors';
import { BaseHomieProperty } from '../src/lib/homie-property';
import { HomieNode } from '../src/lib/homie-node';
import { stringType } from '../src/lib/property-types';
import { PublisherFake } from './publisher-fake';

function createNode(publisher: PublisherFake): HomieNode {
    return new HomieNode({id: 'foo', name: 'bar', type: 'baz'}, publisher);
}

describe('HomieNode', () => {
    it('rejects a duplicate property', () => {
        const publisher = new PublisherFake();
        const homieNode = createNode(publisher);
        const original = new BaseHomieProperty({id: 'foo', name: 'original'}, publisher, stringType);
        const duplicate = new BaseHomieProperty({id: 'foo', name: 'duplicate'}, publisher, stringType);
        let initCalls = 0;

        homieNode.addProperty(original, () => initCalls++);
        assert.throws(() => homieNode.addProperty(duplicate, () => initCalls++), InvalidArgumentError);

        assert.equal(initCalls, 1);
        assert.equal(homieNode.getProperty('foo'), original);
        assert.deepEqual(homieNode.propertyIds(), ['foo']);
    });

    it('publishes its initial config', () => {
        const publisher = new PublisherFake();
        const homieNode = createNode(publisher);

        homieNode.publishConfig();

        assert.deepEqual(publisher.messagePairs, [
            ['foo/$name', 'bar', true],
            ['foo/$type', 'baz', true],
            ['foo/$properties', '', true]
        ]);
    });

    it('republishes the property list when a property is added', () => {
        const publisher = new PublisherFake();
        const homieNode = createNode(publisher);

        homieNode.publishConfig();
        homieNode.string({id: 'hoot'});
        homieNode.string({id: 'qux'});

        assert.deepEqual(publisher.messagePairs.slice(3), [
            ['foo/$properties', 'hoot', true],
            ['foo/$properties', 'hoot,qux', true]
        ]);
    });

    it('publishes the config of its properties after its own', () => {
        const publisher = new PublisherFake();
        const homieNode = createNode(publisher);
        homieNode.bool({id: 'on'});
        publisher.clear();

        homieNode.publishConfig();

        assert.deepEqual(publisher.messagePairs, [
            ['foo/$name', 'bar', true],
            ['foo/$type', 'baz', true],
            ['foo/$properties', 'on', true],
            ['foo/on/$settable', 'false', true],
            ['foo/on/$retained', 'true', true],
            ['foo/on/$datatype', 'boolean', true]
        ]);
    });

    it('uses the id when no name is given', () => {
        const publisher = new PublisherFake();
        new HomieNode({id: 'sensor', type: 'climate'}, publisher).publishConfig();

        assert.deepEqual(publisher.messagePairs[0], ['sensor/$name', 'sensor', true]);
    });

    it('builds typed properties below its topic', () => {
        const publisher = new PublisherFake();
        const homieNode = createNode(publisher);

        const dim = homieNode.integer({id: 'dim', range: {min: 0, max: 100}});
        const temperature = homieNode.float({id: 'temperature', unit: '°C'});
        const color = homieNode.hsv({id: 'color'});
        const mode = homieNode.enumeration({id: 'mode', mapping: new Map([['auto', 'AUTO'], ['manual', 'MANUAL']])});
        const rgb = homieNode.rgb({id: 'rgb'});

        assert.deepEqual(dim.topicSegments, ['foo', 'dim']);
        assert.equal(dim.format, '0:100');
        assert.equal(temperature.datatype, 'float');
        assert.equal(color.format, 'hsv');
        assert.equal(rgb.format, 'rgb');
        assert.equal(mode.format, 'auto,manual');
        assert.deepEqual(homieNode.propertyIds(), ['dim', 'temperature', 'color', 'mode', 'rgb']);

        publisher.clear();
        color.update(new HSV(10, 20, 30));
        mode.update('MANUAL');
        assert.deepEqual(publisher.messagePairs, [
            ['foo/color', '10,20,30', true],
            ['foo/mode', 'manual', true]
        ]);
    });

    it('runs the init callback before announcing the property', () => {
        const publisher = new PublisherFake();
        const homieNode = createNode(publisher);
        const received: Array<string> = [];

        const property = homieNode.string({id: 'text'}, p => {
            p.subscribe(update => received.push(update.update));
        });
        property.mqttReceived('hello');

        assert.deepEqual(publisher.messagePairs, [
            ['foo/text/$settable', 'true', true],
            ['foo/$properties', 'text', true]
        ]);
        assert.deepEqual(received, ['hello']);
    });
});
