// Generic codecs
export * from './EnumCodec';
export * from './BitFlags';
export * from './ButtonCodec';
export * from './KeyedCollection';
export * from './Discriminator';

// Record codecs
export * from './ActivityCodec';
export * from './UserCodec';
export * from './PresenceCodec';
export * from './ReadyCodec';
export * from './GatewayCodec';
