/**
 * Root Descriptor
 *
 * The REST root resource (`GET /db/data`) lists the service endpoints and the
 * server version. Endpoints under the client's root are kept relative to it
 * (`http://foo/db/data/node` → `/node`) so they can be joined onto the root
 * URI the client was given, credentials included.
 *
 * @module client/root-descriptor
 */

import { z } from 'zod'
import { RootDescriptorDecodeError } from './errors'

// ============================================================================
// ZOD SCHEMAS - Runtime validation
// ============================================================================

/**
 * Extension plugins: plugin name → operation name → URI
 */
export const ExtensionsSchema = z.record(z.string(), z.record(z.string(), z.string()))

/**
 * Root resource as sent by the server
 */
export const RootApiResponseSchema = z.object({
  neo4j_version: z.string().optional(),
  node: z.string(),
  node_index: z.string(),
  relationship_index: z.string(),
  batch: z.string(),
  extensions_info: z.string(),
  cypher: z.string().optional(),
  transaction: z.string().optional(),
  reference_node: z.string().nullable().optional(),
  extensions: ExtensionsSchema.optional(),
}).passthrough()

export type RootApiResponse = z.infer<typeof RootApiResponseSchema>

// ============================================================================
// DECODED SHAPE
// ============================================================================

export interface RootDescriptor {
  node: string
  nodeIndex: string
  relationshipIndex: string
  batch: string
  extensionsInfo: string
  cypher?: string
  transaction?: string
  /** Absolute URI of the reference node, when the server has one */
  referenceNode?: string
  /** Version string exactly as reported; empty when absent */
  version: string
  extensions: Record<string, Record<string, string>>
}

/**
 * Handle on the server's reference node
 */
export interface RootNode {
  readonly id: number
  readonly uri: string
}

/**
 * Make an endpoint relative to the root base when it lives under it
 */
export function relativeToRoot(uri: string, rootBase: string): string {
  if (uri === rootBase) {
    return ''
  }
  if (uri.startsWith(`${rootBase}/`)) {
    return uri.slice(rootBase.length)
  }
  return uri
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Decode a parsed root resource body
 *
 * @param raw - The parsed JSON body
 * @param rootBase - Root URI without credentials or trailing slash
 * @throws RootDescriptorDecodeError if required endpoints are missing or mistyped
 */
export function decodeRootDescriptor(raw: unknown, rootBase: string): RootDescriptor {
  const result = RootApiResponseSchema.safeParse(raw)
  if (!result.success) {
    throw new RootDescriptorDecodeError(
      `Invalid root API response: ${describeIssues(result.error)}`,
      result.error.issues
    )
  }

  const body = result.data
  const descriptor: RootDescriptor = {
    node: relativeToRoot(body.node, rootBase),
    nodeIndex: relativeToRoot(body.node_index, rootBase),
    relationshipIndex: relativeToRoot(body.relationship_index, rootBase),
    batch: relativeToRoot(body.batch, rootBase),
    extensionsInfo: relativeToRoot(body.extensions_info, rootBase),
    version: body.neo4j_version ?? '',
    extensions: body.extensions ?? {},
  }

  if (body.cypher !== undefined) {
    descriptor.cypher = relativeToRoot(body.cypher, rootBase)
  }
  if (body.transaction !== undefined) {
    descriptor.transaction = relativeToRoot(body.transaction, rootBase)
  }
  if (body.reference_node) {
    descriptor.referenceNode = body.reference_node
  }

  return descriptor
}

/**
 * Parse and decode the root resource body text
 */
export function parseRootDescriptor(text: string, rootBase: string): RootDescriptor {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new RootDescriptorDecodeError(
      `Root API response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    )
  }
  return decodeRootDescriptor(raw, rootBase)
}

/**
 * The reference node handle, or null when the server has none.
 * The node id is the last path segment of the reference node URI.
 */
export function rootNodeFrom(descriptor: RootDescriptor): RootNode | null {
  const uri = descriptor.referenceNode
  if (uri === undefined) {
    return null
  }

  const segment = uri.replace(/\/+$/, '').split('/').pop() ?? ''
  if (!/^\d+$/.test(segment)) {
    throw new RootDescriptorDecodeError(`reference_node does not end in a node id: ${uri}`)
  }
  const id = Number.parseInt(segment, 10)
  if (!Number.isSafeInteger(id)) {
    throw new RootDescriptorDecodeError(`reference_node id is out of range: ${uri}`)
  }
  return { id, uri }
}
