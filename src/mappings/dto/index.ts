export * from './enrich-mappings.dto';
