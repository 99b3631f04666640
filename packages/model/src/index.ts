export * from './notifications';
export * from './timeline';
export * from './errors';
export * from './messages';
