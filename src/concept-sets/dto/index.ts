export * from './optimize-concept-set.dto';
