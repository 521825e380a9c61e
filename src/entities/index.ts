export * from './conversation.entity';
export * from './message.entity';
export * from './rate-limit-config.entity';
export * from './rate-limit-tracking.entity';
export * from './rate-limit-violation.entity';
