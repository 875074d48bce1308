// Tests for node privilege context predicates

import { describe, it, expect, vi } from 'vitest';
import type { ContentNode, SubgraphIdentity } from '@treegate/protocol';
import type { InMemoryAuthorizationContext } from '@treegate/repositories';
import { createInMemoryAuthorizationContext } from '@treegate/repositories';
import { NodePrivilegeContext } from './context.js';
import { createCapturingLogger } from '../logger.js';

// --- Test Fixtures ---

const liveSubgraph: SubgraphIdentity = {
  contentRepositoryId: 'default',
  contentStreamId: 'cs-live',
  dimensionSpacePoint: { language: 'de' },
};

const orphanSubgraph: SubgraphIdentity = {
  contentRepositoryId: 'default',
  contentStreamId: 'cs-orphan',
  dimensionSpacePoint: { language: 'de' },
};

type Fixture = {
  context: InMemoryAuthorizationContext;
  root: ContentNode;
  sites: ContentNode;
  siteA: ContentNode;
  pageB: ContentNode;
  pageC: ContentNode;
  pageAb: ContentNode;
  orphan: ContentNode;
};

function createFixture(): Fixture {
  const context = createInMemoryAuthorizationContext({
    workspaces: [{ workspaceName: 'live', currentContentStreamId: 'cs-live' }],
    nodeTypes: {
      default: [
        { name: 'Acme:Document' },
        { name: 'Acme:Page', superTypes: ['Acme:Document'] },
        { name: 'Acme:Text' },
      ],
    },
  });
  const add = (nodeAggregateId: string, path: string, subgraph = liveSubgraph) =>
    context.nodes.addNode({ nodeAggregateId, nodeTypeName: 'Acme:Page', subgraph, path });

  return {
    context,
    root: add('root', '/'),
    sites: add('sites', '/sites'),
    siteA: add('site-a', '/sites/a'),
    pageB: add('page-b', '/sites/a/b'),
    pageC: add('page-c', '/sites/a/c'),
    pageAb: add('page-ab', '/sites/ab'),
    orphan: add('orphan', '/sites/a/orphan', orphanSubgraph),
  };
}

// --- Tests ---

describe('NodePrivilegeContext', () => {
  describe('isDescendantNodeOf', () => {
    it('should match nodes below the given path', () => {
      const { context, pageB, sites } = createFixture();

      expect(new NodePrivilegeContext(pageB, context).isDescendantNodeOf('/sites/a')).toBe(true);
      expect(new NodePrivilegeContext(sites, context).isDescendantNodeOf('/sites/a')).toBe(false);
    });

    it('should match the node at the given path itself', () => {
      const { context, siteA } = createFixture();

      expect(new NodePrivilegeContext(siteA, context).isDescendantNodeOf('/sites/a')).toBe(true);
      expect(new NodePrivilegeContext(siteA, context).isDescendantNodeOf('/sites/a/')).toBe(true);
    });

    it('should not match siblings sharing a name prefix', () => {
      const { context, pageAb } = createFixture();

      expect(new NodePrivilegeContext(pageAb, context).isDescendantNodeOf('/sites/a')).toBe(false);
    });

    it('should resolve node aggregate identifiers to paths', () => {
      const { context, pageB, pageAb } = createFixture();

      expect(new NodePrivilegeContext(pageB, context).isDescendantNodeOf('site-a')).toBe(true);
      expect(new NodePrivilegeContext(pageAb, context).isDescendantNodeOf('site-a')).toBe(false);
    });

    it('should match every node below the root', () => {
      const { context, pageB } = createFixture();

      expect(new NodePrivilegeContext(pageB, context).isDescendantNodeOf('/')).toBe(true);
    });
  });

  describe('isAncestorNodeOf', () => {
    it('should match nodes above the given path', () => {
      const { context, root, sites, siteA, pageC } = createFixture();

      expect(new NodePrivilegeContext(root, context).isAncestorNodeOf('/sites/a/b')).toBe(true);
      expect(new NodePrivilegeContext(sites, context).isAncestorNodeOf('/sites/a/b')).toBe(true);
      expect(new NodePrivilegeContext(siteA, context).isAncestorNodeOf('/sites/a/b')).toBe(true);
      expect(new NodePrivilegeContext(pageC, context).isAncestorNodeOf('/sites/a/b')).toBe(false);
    });

    it('should match the node at the given path itself', () => {
      const { context, pageB } = createFixture();

      expect(new NodePrivilegeContext(pageB, context).isAncestorNodeOf('/sites/a/b')).toBe(true);
    });

    it('should not treat a name prefix as an ancestor', () => {
      const { context, siteA } = createFixture();

      expect(new NodePrivilegeContext(siteA, context).isAncestorNodeOf('/sites/ab')).toBe(false);
    });

    it('should resolve node aggregate identifiers to paths', () => {
      const { context, sites, pageAb } = createFixture();

      expect(new NodePrivilegeContext(sites, context).isAncestorNodeOf('page-b')).toBe(true);
      expect(new NodePrivilegeContext(pageAb, context).isAncestorNodeOf('page-b')).toBe(false);
    });
  });

  describe('isAncestorOrDescendantNodeOf', () => {
    it('should match ancestors, descendants and the node itself', () => {
      const { context, sites, siteA, pageB, pageAb } = createFixture();

      expect(new NodePrivilegeContext(sites, context).isAncestorOrDescendantNodeOf('/sites/a')).toBe(true);
      expect(new NodePrivilegeContext(siteA, context).isAncestorOrDescendantNodeOf('/sites/a')).toBe(true);
      expect(new NodePrivilegeContext(pageB, context).isAncestorOrDescendantNodeOf('/sites/a')).toBe(true);
      expect(new NodePrivilegeContext(pageAb, context).isAncestorOrDescendantNodeOf('/sites/a')).toBe(false);
    });
  });

  describe('node identifier operands', () => {
    it('should match its own identifier without reading the content graph', () => {
      const { context, pageB } = createFixture();
      const accessorFor = vi.spyOn(context.nodes, 'accessorFor');
      const ctx = new NodePrivilegeContext(pageB, context);

      expect(ctx.isDescendantNodeOf('page-b')).toBe(true);
      expect(ctx.isAncestorNodeOf('page-b')).toBe(true);
      expect(accessorFor).not.toHaveBeenCalled();
    });

    it('should not match identifiers of missing nodes and log the miss', () => {
      const { context, pageB } = createFixture();
      const logger = createCapturingLogger();
      const ctx = new NodePrivilegeContext(pageB, context, logger);

      expect(ctx.isDescendantNodeOf('ghost')).toBe(false);
      expect(ctx.isAncestorNodeOf('ghost')).toBe(false);
      expect(logger.entries[0]).toMatchObject({
        message: 'Matcher operand did not resolve to a node',
        data: { nodeAggregateId: 'ghost', contentStreamId: 'cs-live' },
      });
    });

    it('should only resolve identifiers within the node subgraph', () => {
      const { context, pageB } = createFixture();

      expect(new NodePrivilegeContext(pageB, context).isAncestorNodeOf('orphan')).toBe(false);
    });

    it('should compare invalid identifiers as literal paths', () => {
      const { context, pageB } = createFixture();
      const ctx = new NodePrivilegeContext(pageB, context);

      expect(ctx.isDescendantNodeOf('Site_A')).toBe(false);
      expect(ctx.isAncestorNodeOf('Site_A')).toBe(false);
    });

    it('should resolve the node accessor once per context', () => {
      const { context, pageB } = createFixture();
      const accessorFor = vi.spyOn(context.nodes, 'accessorFor');
      const ctx = new NodePrivilegeContext(pageB, context);

      ctx.isDescendantNodeOf('/sites/a');
      ctx.isAncestorNodeOf('site-a');
      ctx.isAncestorOrDescendantNodeOf('sites');

      expect(accessorFor).toHaveBeenCalledTimes(1);
      expect(accessorFor).toHaveBeenCalledWith(liveSubgraph);
    });
  });

  describe('nodes missing from the content graph', () => {
    const detached: ContentNode = {
      nodeAggregateId: 'detached',
      nodeTypeName: 'Acme:Page',
      subgraph: { ...liveSubgraph, contentStreamId: 'cs-unknown' },
    };

    it('should not match path predicates and log the missing path', () => {
      const { context } = createFixture();
      const logger = createCapturingLogger();
      const ctx = new NodePrivilegeContext(detached, context, logger);

      expect(ctx.isDescendantNodeOf('/sites')).toBe(false);
      expect(ctx.isAncestorNodeOf('/sites/a/b')).toBe(false);
      expect(ctx.isAncestorOrDescendantNodeOf('/')).toBe(false);
      expect(logger.entries[0]).toMatchObject({
        message: 'Node has no path in its subgraph',
        data: { nodeAggregateId: 'detached', contentStreamId: 'cs-unknown' },
      });
    });

    it('should still match its own identifier', () => {
      const { context } = createFixture();

      expect(new NodePrivilegeContext(detached, context).isDescendantNodeOf('detached')).toBe(true);
    });
  });

  describe('nodeIsOfType', () => {
    it('should match the node type and its super types', () => {
      const { context, pageB } = createFixture();
      const ctx = new NodePrivilegeContext(pageB, context);

      expect(ctx.nodeIsOfType('Acme:Page')).toBe(true);
      expect(ctx.nodeIsOfType('Acme:Document')).toBe(true);
      expect(ctx.nodeIsOfType(['Acme:Text', 'Acme:Document'])).toBe(true);
      expect(ctx.nodeIsOfType('Acme:Text')).toBe(false);
      expect(ctx.nodeIsOfType([])).toBe(false);
    });
  });

  describe('isInWorkspace', () => {
    it('should match the workspace of the node content stream', () => {
      const { context, pageB } = createFixture();
      const ctx = new NodePrivilegeContext(pageB, context);

      expect(ctx.isInWorkspace(['review', 'live'])).toBe(true);
      expect(ctx.isInWorkspace(['review'])).toBe(false);
    });

    it('should not match when no workspace points at the content stream', () => {
      const { context, orphan } = createFixture();

      expect(new NodePrivilegeContext(orphan, context).isInWorkspace(['live'])).toBe(false);
    });
  });

  describe('isInDimensionPreset', () => {
    it('should match the node coordinate in a dimension', () => {
      const { context, pageB } = createFixture();
      const ctx = new NodePrivilegeContext(pageB, context);

      expect(ctx.isInDimensionPreset('language', ['de', 'fr'])).toBe(true);
      expect(ctx.isInDimensionPreset('language', 'de')).toBe(true);
      expect(ctx.isInDimensionPreset('language', ['en'])).toBe(false);
    });

    it('should not match dimensions the node has no coordinate in', () => {
      const { context, pageB } = createFixture();

      expect(new NodePrivilegeContext(pageB, context).isInDimensionPreset('market', ['eu'])).toBe(false);
    });
  });
});
