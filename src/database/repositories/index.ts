export * from './domain.types';
export * from './general-concept.repository';
export * from './mapping.repository';
