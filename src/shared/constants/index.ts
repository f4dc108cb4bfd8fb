export * from './deviceTypes';
