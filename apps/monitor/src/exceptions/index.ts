export * from './monitor.exception';
