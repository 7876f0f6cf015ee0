import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { z } from 'zod';
import { schemaContentType } from '../../src/core/content-type.js';
import { describeExpression } from '../../src/core/expression.js';
import {
  AmbiguousGroupNameError,
  DuplicateGroupNameError,
  RegistryFrozenError,
  TypeMismatchError,
  UnknownGroupError,
} from '../../src/core/errors.js';
import { PredicateFilterBuilder } from '../../src/core/predicate-filter.js';
import {
  CommentType,
  PostSchema,
  PostType,
  admin,
  createBlogBuilder,
  createBuilder,
  editor,
  ids,
  posts,
  submitter,
  type Comment,
  type TestUser,
} from '../helpers/blog.js';

/**
 * 关系型权限过滤器单元测试。
 *
 * 覆盖 allow/deny 合并、全局权限、组名复用、isMember 和构建器冻结。
 */
describe('PredicateFilter', () => {
  const comments: Comment[] = [
    { kind: 'comment', id: 10, authorId: 1 },
    { kind: 'comment', id: 11, authorId: 2 },
  ];

  // ── filter ──

  describe('filter', () => {
    it('should let submitters edit their own posts', () => {
      const filter = createBlogBuilder().build();
      expect(ids(filter.filter(posts, PostType, 'edit', submitter))).toEqual([1, 2]);
    });

    it('should never let submitters approve their own posts', () => {
      const filter = createBlogBuilder().build();
      // 用户 1 是帖子 1 的编辑，但同时是提交者，deny 覆盖 allow。
      expect(ids(filter.filter(posts, PostType, 'approve', submitter))).toEqual([]);
    });

    it('should let editors edit and approve posts they edit', () => {
      const filter = createBlogBuilder().build();
      expect(ids(filter.filter(posts, PostType, 'edit', editor))).toEqual([2]);
      expect(ids(filter.filter(posts, PostType, 'approve', editor))).toEqual([2]);
    });

    it('should let a global allow authorize every post', () => {
      const filter = createBlogBuilder().build();
      expect(ids(filter.filter(posts, PostType, 'edit', admin))).toEqual([1, 2, 3, 4]);
    });

    it('should let a relational deny override a global allow', () => {
      const filter = createBlogBuilder().build();
      // admin 是帖子 3 的提交者。
      expect(ids(filter.filter(posts, PostType, 'approve', admin))).toEqual([1, 2, 4]);
    });

    it('should support groups that only look at the user key', () => {
      const builder = createBlogBuilder();
      builder.addGroup('post-administrator-for-even-ids', PostType, (p, id) => id === 4 && p.id % 2 === 0);
      builder.addPermission('post-administrator-for-even-ids', 'edit', 'allow');
      builder.addPermission('post-administrator-for-even-ids', 'approve', 'allow');
      const filter = builder.build();
      const evenAdmin: TestUser = { id: 4, name: 'even-admin', globalPermissions: [] };

      expect(ids(filter.filter(posts, PostType, 'edit', evenAdmin))).toEqual([2, 4]);
      expect(ids(filter.filter(posts, PostType, 'approve', evenAdmin))).toEqual([2, 4]);
    });

    it('should deny by default for a permission no group or global entry defines', () => {
      const filter = createBlogBuilder().build();
      expect(filter.filter(posts, PostType, 'delete', admin)).toEqual([]);
      expect(filter.filter(posts, PostType, 'delete', submitter)).toEqual([]);
    });

    it('should allow everything on a global allow with no relational rule', () => {
      const filter = createBlogBuilder().build();
      const publisher: TestUser = { id: 9, name: 'publisher', globalPermissions: [{ name: 'publish', value: 'allow' }] };
      expect(ids(filter.filter(posts, PostType, 'publish', publisher))).toEqual([1, 2, 3, 4]);
    });

    it('should deny everything on a global deny even when allow groups match', () => {
      const filter = createBlogBuilder().build();
      const suspended: TestUser = { id: 2, name: 'suspended', globalPermissions: [{ name: 'edit', value: 'deny' }] };
      expect(filter.filter(posts, PostType, 'edit', suspended)).toEqual([]);
    });

    it('should let a global deny win over a global allow', () => {
      const filter = createBlogBuilder().build();
      const conflicted: TestUser = {
        id: 9,
        name: 'conflicted',
        globalPermissions: [
          { name: 'edit', value: 'allow' },
          { name: 'EDIT', value: 'deny' },
        ],
      };
      expect(filter.filter(posts, PostType, 'edit', conflicted)).toEqual([]);
    });

    it('should ignore groups that declare the permission as inherit', () => {
      const builder = createBlogBuilder();
      builder.addGroup('watcher', PostType, () => true);
      builder.addPermission('watcher', 'edit', 'inherit');
      const filter = builder.build();
      expect(ids(filter.filter(posts, PostType, 'edit', submitter))).toEqual([1, 2]);
    });

    it('should match permission names case-insensitively', () => {
      const filter = createBlogBuilder().build();
      expect(ids(filter.filter(posts, PostType, 'EDIT', submitter))).toEqual([1, 2]);
      expect(filter.testGlobal('Approve', admin)).toBe(true);
    });

    it('should return identical results on repeated calls', () => {
      const filter = createBlogBuilder().build();
      const first = filter.filter(posts, PostType, 'approve', admin);
      const second = filter.filter(posts, PostType, 'approve', admin);
      expect(second).toEqual(first);
      expect(posts.length).toBe(4);
    });

    it('should treat every user as inherit when no global resolver is configured', () => {
      const filter = createBlogBuilder({ getGlobalPermissions: undefined }).build();
      expect(ids(filter.filter(posts, PostType, 'edit', admin))).toEqual([3]);
      expect(filter.testGlobal('edit', admin)).toBe(false);
    });
  });

  // ── test / testGlobal / decision ──

  describe('test', () => {
    it('should agree with filter on a single item', () => {
      const filter = createBlogBuilder().build();
      expect(filter.test(posts[0], PostType, 'edit', submitter)).toBe(true);
      expect(filter.test(posts[2], PostType, 'edit', submitter)).toBe(false);
      expect(filter.test(posts[2], PostType, 'approve', admin)).toBe(false);
    });
  });

  describe('testGlobal', () => {
    it('should be true only for a global allow', () => {
      const filter = createBlogBuilder().build();
      const inheriting: TestUser = { id: 9, name: 'inheriting', globalPermissions: [{ name: 'edit', value: 'inherit' }] };

      expect(filter.testGlobal('approve', admin)).toBe(true);
      expect(filter.testGlobal('approve', submitter)).toBe(false);
      expect(filter.testGlobal('edit', inheriting)).toBe(false);
    });
  });

  describe('decision', () => {
    it('should expose the combined expression', () => {
      const filter = createBlogBuilder().build();

      const forSubmitter = filter.decision(PostType, 'approve', submitter);
      expect(forSubmitter.globalVerdict).toBe('inherit');
      expect(describeExpression(forSubmitter.expression)).toBe('match(post-editor) AND NOT match(post-submitter)');

      const forAdmin = filter.decision(PostType, 'approve', admin);
      expect(forAdmin.globalVerdict).toBe('allow');
      expect(describeExpression(forAdmin.expression)).toBe('NOT match(post-submitter)');

      expect(describeExpression(filter.decision(PostType, 'delete', admin).expression)).toBe('false');
    });

    it('should be reusable across items', () => {
      const filter = createBlogBuilder().build();
      const decision = filter.decision(PostType, 'edit', submitter);
      expect(posts.map((p) => decision.test(p))).toEqual([true, true, false, false]);
    });

    it('should log the decision at debug level', () => {
      const lines: string[] = [];
      const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });
      const filter = createBlogBuilder({ logger }).build();

      filter.decision(PostType, 'edit', submitter);

      expect(lines.length).toBe(1);
      const entry: unknown = JSON.parse(lines[0]);
      expect(entry).toMatchObject({
        msg: 'Built permission decision',
        contentType: 'post',
        permission: 'edit',
        globalVerdict: 'inherit',
        allowGroups: ['post-submitter', 'post-editor'],
        denyGroups: [],
        expression: 'match(post-submitter) OR match(post-editor)',
      });
    });
  });

  // ── group name reuse ──

  describe('group name reuse', () => {
    it('should reject a reused name across content types by default', () => {
      const builder = createBlogBuilder();
      expect(() => builder.addGroup('post-submitter', CommentType, (c, id) => c.authorId === id)).toThrow(
        DuplicateGroupNameError,
      );
    });

    it('should keep permissions of a reused name isolated per content type', () => {
      const builder = createBuilder({ allowReusingGroupNames: true });
      builder.addGroup('owner', PostType, (p, id) => p.submitterId === id);
      builder.addGroup('owner', CommentType, (c, id) => c.authorId === id);
      builder.addPermission('owner', 'edit', 'allow', PostType);
      builder.addPermission('owner', 'edit', 'deny', CommentType);
      builder.addPermission('owner', 'view', 'allow', CommentType);
      const filter = builder.build();

      expect(ids(filter.filter(posts, PostType, 'edit', submitter))).toEqual([1, 2]);
      expect(filter.filter(comments, CommentType, 'edit', submitter)).toEqual([]);
      expect(ids(filter.filter(comments, CommentType, 'view', submitter))).toEqual([10]);
      expect(filter.filter(posts, PostType, 'view', submitter)).toEqual([]);
    });

    it('should require disambiguation when attaching a permission to a reused name', () => {
      const builder = createBuilder({ allowReusingGroupNames: true });
      builder.addGroup('owner', PostType, (p, id) => p.submitterId === id);
      builder.addGroup('owner', CommentType, (c, id) => c.authorId === id);
      expect(() => builder.addPermission('owner', 'edit', 'allow')).toThrow(AmbiguousGroupNameError);
    });
  });

  // ── isMember ──

  describe('isMember', () => {
    it('should evaluate the named group directly', () => {
      const filter = createBlogBuilder().build();
      expect(filter.isMember(posts[0], 'post-submitter', submitter)).toBe(true);
      expect(filter.isMember(posts[1], 'Post-Editor', submitter)).toBe(false);
      expect(filter.isMember(posts[1], 'post-editor', editor)).toBe(true);
    });

    it('should throw for an unknown group', () => {
      const filter = createBlogBuilder().build();
      expect(() => filter.isMember(posts[0], 'post-owner', submitter)).toThrow(UnknownGroupError);
    });

    it('should throw when the item does not fit the group content type', () => {
      const filter = createBlogBuilder().build();
      expect(() => filter.isMember(comments[0], 'post-submitter', submitter)).toThrow(TypeMismatchError);
    });

    it('should pick the group matching the item type under reuse', () => {
      const builder = createBuilder({ allowReusingGroupNames: true });
      builder.addGroup('owner', PostType, (p, id) => p.submitterId === id);
      builder.addGroup('owner', CommentType, (c, id) => c.authorId === id);
      const filter = builder.build();

      expect(filter.isMember(comments[1], 'owner', editor)).toBe(true);
      expect(filter.isMember(posts[1], 'owner', editor)).toBe(false);
    });

    it('should throw when several groups of that name accept the item', () => {
      const DraftType = schemaContentType('draft', PostSchema);
      const builder = createBuilder({ allowReusingGroupNames: true });
      builder.addGroup('owner', PostType, (p, id) => p.submitterId === id);
      builder.addGroup('owner', DraftType, (p, id) => p.editorId === id);
      const filter = builder.build();

      expect(() => filter.isMember(posts[0], 'owner', submitter)).toThrow(AmbiguousGroupNameError);
    });
  });

  // ── builder ──

  describe('PredicateFilterBuilder', () => {
    it('should keep the groups of a built filter read-only', () => {
      const filter = createBlogBuilder().build();
      const editorGroup = filter.groups()[1];

      expect(editorGroup.isFrozen).toBe(true);
      expect(() => editorGroup.setPermission('edit', 'deny')).toThrow(RegistryFrozenError);
      expect(() => editorGroup.replaceMatch(PostType, () => true)).toThrow(RegistryFrozenError);
      expect(ids(filter.filter(posts, PostType, 'edit', editor))).toEqual([2]);
    });

    it('should not leak later declarations into an already built filter', () => {
      const builder = createBlogBuilder();
      const before = builder.build();
      builder.addPermission('post-editor', 'delete', 'allow');
      const after = builder.build();

      expect(before.filter(posts, PostType, 'delete', editor)).toEqual([]);
      expect(ids(after.filter(posts, PostType, 'delete', editor))).toEqual([2]);
    });

    it('should work with a user that is its own key', () => {
      const Tag = schemaContentType('tag', z.object({ owner: z.string() }));
      const builder = new PredicateFilterBuilder<string, string>({ getUserKey: (user) => user });
      builder.addGroup('tag-owner', Tag, (tag, user) => tag.owner === user);
      builder.addPermission('tag-owner', 'rename', 'allow');
      const filter = builder.build();

      expect(filter.filter([{ owner: 'ann' }, { owner: 'bob' }], Tag, 'rename', 'bob')).toEqual([{ owner: 'bob' }]);
      expect(filter.reusesGroupNames).toBe(false);
      expect(filter.groups().map((g) => g.name)).toEqual(['tag-owner']);
    });
  });
});
