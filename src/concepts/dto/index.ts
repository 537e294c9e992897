export * from './concept-response.dto';
export * from './search-concepts.dto';
