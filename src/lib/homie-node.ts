import { homieLogger } from '../logger';
import { HSV, RGB } from './color';
import { InvalidArgumentError } from './errors';
import { HierarchicalHomiePublisher } from './hierarchical-homie-publisher';
import { BaseHomieProperty } from './homie-property';
import {
    EnumPropertyOptions,
    HomieProperty,
    HomiePublisher,
    HomieUnit,
    NodeOptions,
    NumberPropertyOptions,
    PropertyOptions
} from './interfaces';
import { booleanType, enumType, floatType, hsvType, integerType, PropertyType, rgbType, stringType } from './property-types';

export type PropertyInit<T> = (property: HomieProperty<T>) => void;

export class HomieNode implements HomieUnit {
    readonly id: string;
    readonly name: string;
    readonly type: string;

    private readonly publisher: HierarchicalHomiePublisher;
    private readonly properties = new Map<string, HomieProperty<unknown>>();

    constructor(options: NodeOptions, parentPublisher: HomiePublisher) {
        this.id = options.id;
        this.name = options.name ?? options.id;
        this.type = options.type;
        this.publisher = new HierarchicalHomiePublisher(parentPublisher, options.id);
    }

    get topicSegments(): Array<string> {
        return this.publisher.topic();
    }

    getProperty(id: string): HomieProperty<unknown> | undefined {
        return this.properties.get(id);
    }

    propertyIds(): Array<string> {
        return [...this.properties.keys()];
    }

    /**
     * Registers the property and republishes `$properties`. `init` runs before the property is
     * added, so subscribers attached there are in place once the node announces it.
     */
    addProperty<T>(property: HomieProperty<T>, init?: PropertyInit<T>): HomieProperty<T> {
        if (this.properties.has(property.id)) {
            throw new InvalidArgumentError(`Duplicate property id ${property.id} in node ${this.id}`);
        }
        init?.(property);
        this.properties.set(property.id, property);
        homieLogger.debug(`Added ${property.datatype} property ${property.id} to node ${this.id}`);
        this.publishProperties();

        return property;
    }

    string(options: PropertyOptions, init?: PropertyInit<string>): HomieProperty<string> {
        return this.createProperty(options, stringType, init);
    }

    integer(options: NumberPropertyOptions, init?: PropertyInit<number>): HomieProperty<number> {
        return this.createProperty(options, integerType(options.range), init);
    }

    float(options: NumberPropertyOptions, init?: PropertyInit<number>): HomieProperty<number> {
        return this.createProperty(options, floatType(options.range), init);
    }

    bool(options: PropertyOptions, init?: PropertyInit<boolean>): HomieProperty<boolean> {
        return this.createProperty(options, booleanType, init);
    }

    enumeration<E>(options: EnumPropertyOptions<E>, init?: PropertyInit<E>): HomieProperty<E> {
        return this.createProperty(options, enumType(options.mapping), init);
    }

    hsv(options: PropertyOptions, init?: PropertyInit<HSV>): HomieProperty<HSV> {
        return this.createProperty(options, hsvType, init);
    }

    rgb(options: PropertyOptions, init?: PropertyInit<RGB>): HomieProperty<RGB> {
        return this.createProperty(options, rgbType, init);
    }

    publishConfig(): void {
        this.publisher.publishMessage({suffix: '$name', payload: this.name});
        this.publisher.publishMessage({suffix: '$type', payload: this.type});
        this.publishProperties();
        this.properties.forEach(property => property.publishConfig());
    }

    private createProperty<T>(options: PropertyOptions, type: PropertyType<T>, init?: PropertyInit<T>): HomieProperty<T> {
        return this.addProperty(new BaseHomieProperty(options, this.publisher, type), init);
    }

    private publishProperties(): void {
        this.publisher.publishMessage({suffix: '$properties', payload: this.propertyIds().join(',')});
    }
}
