export * from './graph-common.dto';
export * from './hierarchy-graph.dto';
