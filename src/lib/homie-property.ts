import * as _ from 'lodash';
import { HierarchicalHomiePublisher } from './hierarchical-homie-publisher';
import { HomieDatatype, HomieProperty, HomiePublisher, PropertyObserver, PropertyOptions } from './interfaces';
import { PropertyType } from './property-types';

interface LastValue<T> {
    value: T;
}

export class BaseHomieProperty<T> implements HomieProperty<T> {
    readonly id: string;
    readonly name?: string;
    readonly retained: boolean;
    readonly unit?: string;
    readonly datatype: HomieDatatype;
    readonly format?: string;
    readonly topicSegments: Array<string>;

    private readonly publisher: HierarchicalHomiePublisher;
    private observer?: PropertyObserver<T>;
    private lastValue?: LastValue<T>;

    constructor(options: PropertyOptions,
                parentPublisher: HomiePublisher,
                private readonly type: PropertyType<T>) {
        this.id = options.id;
        this.name = options.name;
        this.retained = options.retained ?? true;
        this.unit = options.unit;
        this.datatype = type.datatype;
        this.format = type.format;
        this.publisher = new HierarchicalHomiePublisher(parentPublisher, options.id);
        this.topicSegments = this.publisher.topic();
    }

    get settable(): boolean {
        return this.observer !== undefined;
    }

    update(value: T): void {
        this.type.validate(value);
        if (this.lastValue && _.isEqual(this.lastValue.value, value)) {
            return;
        }
        this.publisher.publishMessage({payload: this.type.toPayload(value), retained: this.retained});
        this.lastValue = {value};
    }

    mqttReceived(payload: string): void {
        if (!this.observer) {
            return;
        }
        this.observer({property: this, update: this.type.fromPayload(payload)});
    }

    publishConfig(): void {
        if (this.name !== undefined) {
            this.publisher.publishMessage({suffix: '$name', payload: this.name});
        }
        this.publishSettable();
        this.publisher.publishMessage({suffix: '$retained', payload: this.retained.toString()});
        if (this.unit !== undefined) {
            this.publisher.publishMessage({suffix: '$unit', payload: this.unit});
        }
        this.publisher.publishMessage({suffix: '$datatype', payload: this.datatype});
        if (this.format !== undefined) {
            this.publisher.publishMessage({suffix: '$format', payload: this.format});
        }
    }

    subscribe(observer: PropertyObserver<T>): HomieProperty<T> {
        this.observer = observer;
        this.publishSettable();

        return this;
    }

    private publishSettable(): void {
        this.publisher.publishMessage({suffix: '$settable', payload: this.settable.toString()});
    }
}
