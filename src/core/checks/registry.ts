/**
 * Check registry - maps check ids to implementations.
 */
import { CHECK_IDS, type CheckId } from '../config/schema.js';
import type { DocumentationCheck } from './types.js';
import { RestCheck } from './rest.js';
import { OpenApiCheck } from './openapi.js';
import { GraphQLCheck } from './graphql.js';
import { ProtoCheck } from './proto.js';
import { MarkdownCheck } from './markdown.js';
import { SphinxCheck } from './sphinx.js';
import { AccessLevelCheck } from './access-level.js';
import { FormattingCheck } from './formatting.js';

const checkRegistry = new Map<CheckId, DocumentationCheck>();

checkRegistry.set('rest', new RestCheck());
checkRegistry.set('openapi', new OpenApiCheck());
checkRegistry.set('graphql', new GraphQLCheck());
checkRegistry.set('proto', new ProtoCheck());
checkRegistry.set('markdown', new MarkdownCheck());
checkRegistry.set('sphinx', new SphinxCheck());
checkRegistry.set('access-level', new AccessLevelCheck());
checkRegistry.set('formatting', new FormattingCheck());

export function getCheck(id: CheckId): DocumentationCheck | undefined {
  return checkRegistry.get(id);
}

/**
 * All registered checks in canonical run order.
 */
export function getAllChecks(): DocumentationCheck[] {
  return CHECK_IDS.flatMap((id) => {
    const check = checkRegistry.get(id);
    return check ? [check] : [];
  });
}
