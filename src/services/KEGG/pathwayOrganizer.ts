/**
 * @fileoverview Flattens the KEGG pathway Brite hierarchy (`br:br08901`) into
 * a map of node key to node information, so pathway maps can be grouped by
 * the categories above them.
 * @module src/services/KEGG/pathwayOrganizer
 */

import { z } from "zod";
import { BaseErrorCode, McpError } from "../../types-global/errors.js";
import {
  logger,
  RequestContext,
  requestContextService,
} from "../../utils/index.js";
import { KeggRestService } from "./core/keggRestService.js";

export const PATHWAY_HIERARCHY_ID = "br:br08901";

export interface BriteNode {
  name: string;
  children?: BriteNode[];
}

const BriteNodeSchema: z.ZodType<BriteNode> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    children: z.array(BriteNodeSchema).optional(),
  }),
);

const BriteHierarchySchema = z.object({
  name: z.string(),
  children: z.array(BriteNodeSchema),
});

export interface HierarchyNode {
  /** The name as it appears in the hierarchy. */
  name: string;
  /** 1 for top-level categories. */
  level: number;
  /** Key of the parent node; null at the top level. */
  parent: string | null;
  /** Sorted keys of the child nodes; null for pathway maps. */
  children: string[] | null;
  /** `path:map<number>` for pathway maps, null for categories. */
  entryId: string | null;
}

/** Keyed by entry ID for pathway maps and by name for categories. */
export type HierarchyNodes = Record<string, HierarchyNode>;

export interface PathwayOrganizerOptions {
  /** Names of top-level categories to keep; all of them when omitted. */
  topLevelNodes?: readonly string[];
  /** Names of nodes to leave out together with everything below them. */
  filterNodes?: readonly string[];
}

/**
 * @throws {McpError} `PARSING_ERROR` when two nodes share a key.
 */
export function flattenHierarchy(
  topLevel: readonly BriteNode[],
  filterNodes: ReadonlySet<string> = new Set(),
): HierarchyNodes {
  const nodes: HierarchyNodes = {};

  const addNode = (key: string, node: HierarchyNode): string => {
    if (Object.prototype.hasOwnProperty.call(nodes, key)) {
      throw new McpError(
        BaseErrorCode.PARSING_ERROR,
        `Duplicate Brite hierarchy node name ${key}`,
      );
    }
    nodes[key] = node;
    return key;
  };

  const visit = (branch: readonly BriteNode[], level: number, parent: string | null): string[] =>
    branch
      .filter(({ name }) => !filterNodes.has(name))
      .map(({ name, children }) => {
        if (children === undefined) {
          const entryId = `path:map${name.split(" ")[0]}`;
          return addNode(entryId, { name, level, parent, children: null, entryId });
        }
        const childKeys = visit(children, level + 1, name);
        return addNode(name, {
          name,
          level,
          parent,
          children: childKeys.sort(),
          entryId: null,
        });
      });

  visit(topLevel, 1, null);
  return nodes;
}

export const hierarchyNodesToJson = (nodes: HierarchyNodes): string =>
  JSON.stringify(nodes, null, 2);

export class PathwayOrganizer {
  constructor(private readonly rest: KeggRestService = new KeggRestService()) {}

  /**
   * Gets the pathway hierarchy from KEGG and flattens it. Unknown top-level
   * names are ignored with a warning.
   * @throws {McpError} `KEGG_API_ERROR` when the request fails, `PARSING_ERROR`
   *   when the body is not the expected hierarchy.
   */
  public async loadFromKegg(
    options: PathwayOrganizerOptions = {},
    context: RequestContext = requestContextService.createRequestContext({
      operation: "PathwayOrganizer.loadFromKegg",
    }),
  ): Promise<HierarchyNodes> {
    let topLevel = await this.getHierarchy(context);

    if (options.topLevelNodes !== undefined) {
      const known = new Set(topLevel.map(({ name }) => name));
      for (const name of options.topLevelNodes) {
        if (!known.has(name)) {
          logger.warning(
            `Top level node name "${name}" is not recognized and will be ignored.`,
            context,
          );
        }
      }
      const selected = new Set(options.topLevelNodes);
      topLevel = topLevel.filter(({ name }) => selected.has(name));
    }

    const nodes = flattenHierarchy(topLevel, new Set(options.filterNodes));
    logger.info(`Flattened the pathway hierarchy into ${Object.keys(nodes).length} nodes`, context);
    return nodes;
  }

  private async getHierarchy(context: RequestContext): Promise<BriteNode[]> {
    const response = await this.rest.get([PATHWAY_HIERARCHY_ID], "json", context);
    if (response.status !== "success") {
      throw new McpError(
        BaseErrorCode.KEGG_API_ERROR,
        `Failed to get the pathway hierarchy from the following URL: ${response.keggUrl.url}`,
        { url: response.keggUrl.url, status: response.status },
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(response.textBody);
    } catch (error) {
      throw new McpError(
        BaseErrorCode.PARSING_ERROR,
        `The pathway hierarchy is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    const parsed = BriteHierarchySchema.safeParse(json);
    if (!parsed.success) {
      throw new McpError(
        BaseErrorCode.PARSING_ERROR,
        `The pathway hierarchy does not have the expected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      );
    }
    return parsed.data.children;
  }
}
