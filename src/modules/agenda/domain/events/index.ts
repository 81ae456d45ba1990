export * from './agenda.events';
