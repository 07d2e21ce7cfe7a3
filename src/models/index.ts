// Data models and interfaces
export * from './Activity';
export * from './Flags';
export * from './User';
export * from './PresenceUser';
export * from './Presence';
export * from './Ready';
export * from './Gateway';

// Wire payload shapes
export * from './WireTypes';

// Error types
export * from './ErrorTypes';
