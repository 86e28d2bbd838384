export * from './types.js';
export * from './base.js';
export * from './registry.js';
export { RestCheck } from './rest.js';
export { OpenApiCheck } from './openapi.js';
export { GraphQLCheck, validateSchemaSource, type SchemaProblem } from './graphql.js';
export { ProtoCheck } from './proto.js';
export { MarkdownCheck } from './markdown.js';
export { SphinxCheck } from './sphinx.js';
export { AccessLevelCheck, ACCESS_LEVELS, readBanner, type BannerStatus } from './access-level.js';
export {
  FormattingCheck,
  buildFormattingRules,
  findRuleMatches,
  EMOJI_PATTERN,
  EM_DASH_PATTERN,
  type FormattingRule,
  type RuleMatch,
} from './formatting.js';
