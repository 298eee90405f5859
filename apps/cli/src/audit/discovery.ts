/**
 * Compartment tree discovery.
 *
 * Walks the compartment hierarchy depth-first from the tenancy root and
 * returns every reachable compartment in pre-order (a parent always comes
 * before any of its descendants). Children are visited in the order the
 * identity service returns them.
 *
 * A child list that cannot be fetched is treated as "no children": the node
 * itself stays in the result and the walk continues with its siblings.
 */
import {
	PATH_SEPARATOR,
	type CompartmentNode,
	type CompartmentSummary
} from '@policy-audit/types';
import type { DirectoryClient } from '@policy-audit/shared/oci/directory-client';
import { createLogger } from '@policy-audit/server/logger';

const log = createLogger('discovery');

/** OCI allows six levels of nesting below the root; the cap only guards against bad data. */
export const DEFAULT_MAX_DEPTH = 16;

export type ChildCompartmentSource = Pick<DirectoryClient, 'listChildCompartments'>;

export interface DiscoveryOptions {
	/** Nodes at this depth are emitted but not expanded. */
	maxDepth?: number;
	/** Progress hook, fired once per node after its children have been listed. */
	onCompartment?: (node: CompartmentNode, childCount: number) => void;
}

/**
 * Discover the compartment tree below (and including) the tenancy root.
 *
 * @example
 * const nodes = await discoverCompartmentTree(client, { id: tenancyId, name: 'acme' });
 * // [{ id: tenancyId, name: 'acme', depth: 0, path: 'acme' },
 * //  { id: 'ocid1.compartment...', name: 'Network', depth: 1, path: 'acme > Network' }, ...]
 */
export async function discoverCompartmentTree(
	source: ChildCompartmentSource,
	root: CompartmentSummary,
	options: DiscoveryOptions = {}
): Promise<CompartmentNode[]> {
	const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
	const nodes: CompartmentNode[] = [];
	const visited = new Set<string>();

	const visit = async (node: CompartmentNode): Promise<void> => {
		nodes.push(node);
		visited.add(node.id);
		log.info({ compartment: node.name, depth: node.depth }, 'Discovering compartment');

		if (node.depth >= maxDepth) {
			log.warn({ compartment: node.path, maxDepth }, 'Depth limit reached, not descending');
			options.onCompartment?.(node, 0);
			return;
		}

		const children = await listChildrenOrEmpty(source, node);
		log.debug({ compartment: node.name, children: children.length }, 'Subcompartments found');
		options.onCompartment?.(node, children.length);

		for (const child of children) {
			if (visited.has(child.id)) {
				log.warn({ compartmentId: child.id, parent: node.path }, 'Compartment already visited, skipping');
				continue;
			}
			await visit(childNode(node, child));
		}
	};

	await visit(rootNode(root));
	return nodes;
}

/** The tenancy root: depth 0, path is its own name. */
export function rootNode(root: CompartmentSummary): CompartmentNode {
	return Object.freeze({ id: root.id, name: root.name, depth: 0, path: root.name });
}

/** A child one level below `parent`, with the parent's path extended by its name. */
export function childNode(parent: CompartmentNode, child: CompartmentSummary): CompartmentNode {
	return Object.freeze({
		id: child.id,
		name: child.name,
		depth: parent.depth + 1,
		path: `${parent.path}${PATH_SEPARATOR}${child.name}`
	});
}

async function listChildrenOrEmpty(
	source: ChildCompartmentSource,
	node: CompartmentNode
): Promise<CompartmentSummary[]> {
	try {
		return await source.listChildCompartments(node.id);
	} catch (err) {
		log.warn({ err, compartment: node.path }, 'Could not list subcompartments, treating as none');
		return [];
	}
}
