export * from './command-options.interface';
export * from './module-async-options.interface';
export * from './module-options.interface';
export * from './render-options.interface';
export * from './secret-backend.interface';
export * from './secret-tree.interface';
