export * from './constants';
export * from './errors';
export * from './interface';
export { kvtreeConfig } from './config/kvtree.config';
export { KvTreeModule } from './kvtree.module';
export {
  ExportService,
  ImportService,
  ParameterStoreBackendService,
  SecretsManagerBackendService,
} from './services';
export { PathCodec } from './utils/path-codec.util';
export { RootResolver, RootKind } from './utils/root-resolver.util';
export { TreeMerger } from './utils/tree-merger.util';
export {
  SecretRendererUtil,
  RenderOptionsInput,
} from './utils/secret-renderer.util';
export { InputParserUtil, InputFormat, ParsedInput } from './utils/input-parser.util';
export { SecretTreeUtil, PlainSecretNode } from './utils/secret-tree.util';
