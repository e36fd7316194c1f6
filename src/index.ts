export { HSV, RGB } from './lib/color';
export { IllegalStateError, InvalidArgumentError, InvalidValueError, NoSuchKeyError } from './lib/errors';
export { HierarchicalHomiePublisher, SubjectHomiePublisher } from './lib/hierarchical-homie-publisher';
export type { PublishRequest } from './lib/hierarchical-homie-publisher';
export { Device, device, HOMIE_VERSION, HomieDevice } from './lib/homie-device';
export type { NodeInit } from './lib/homie-device';
export { HomieMqttClient, DEFAULT_HOMIE_ROOT } from './lib/homie-mqtt-client';
export type { HomieMqttClientOptions } from './lib/homie-mqtt-client';
export { HomieNode } from './lib/homie-node';
export type { PropertyInit } from './lib/homie-node';
export { BaseHomieProperty } from './lib/homie-property';
export {
    booleanType,
    enumType,
    floatType,
    hsvType,
    integerType,
    rgbType,
    stringType
} from './lib/property-types';
export type { PropertyType } from './lib/property-types';
export type * from './lib/interfaces';
export { loadMqttServerConfig } from './settings';
export { homieLogger } from './logger';
