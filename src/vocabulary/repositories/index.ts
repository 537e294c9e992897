export * from './ancestor.repository';
export * from './concept.repository';
export * from './relationship.repository';
export * from './synonym.repository';
