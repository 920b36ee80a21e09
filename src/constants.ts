/**
 * Application-wide constants used across different modules.
 */

/**
 * Reconciliation timing constants, all in milliseconds
 */
export const RECONCILE = {
  /**
   * Interval between two convergence or termination polls
   */
  POLL_INTERVAL: 2_000,

  /**
   * Ceiling for stage-one convergence. Not configurable and never skipped.
   */
  STAGE_ONE_TIMEOUT: 30_000,

  /**
   * Stage-two convergence and termination deadline when none is given
   */
  DEFAULT_WAIT_TIMEOUT: 5 * 60_000
} as const

/**
 * Kubernetes API constants
 */
export const KUBERNETES = {
  /**
   * Field manager recorded on server-side applied objects
   */
  DEFAULT_FIELD_MANAGER: 'manifests-reconcile',

  /**
   * Content type selecting server-side apply on PATCH requests
   */
  APPLY_PATCH_CONTENT_TYPE: 'application/apply-patch+yaml',

  /**
   * Group and kind pairs applied ahead of everything else
   */
  CLUSTER_DEFINITIONS: [
    { group: '', kind: 'namespace' },
    { group: 'apiextensions.k8s.io', kind: 'customresourcedefinition' }
  ]
} as const

/**
 * GitHub API and comment-related constants
 */
export const GITHUB = {
  /**
   * Maximum length for a GitHub comment before it needs to be split.
   * GitHub's actual limit is ~65536 chars, but we use a lower value for safety.
   */
  MAX_COMMENT_LENGTH: 60000,

  /**
   * Buffer space to reserve when calculating comment length limits.
   * This accounts for footers, continuation text, and formatting.
   */
  COMMENT_LENGTH_BUFFER: 100
} as const

/**
 * Comment formatting constants
 */
export const COMMENTS = {
  DEFAULT_TITLE: 'Kubernetes Reconciliation',

  /**
   * Text shown when a comment is continued in the next comment
   */
  CONTINUATION_TEXT: '\n\n---\n*Continued in next comment...*',

  /**
   * Header for continuation comments
   */
  CONTINUATION_HEADER: '## 🚀 {title} (continued)\n\n',

  /**
   * Header template for the comment section, with placeholders for dynamic values
   */
  HEADER_TEMPLATE: `## 🚀 {title}
{subtitle}
Reconciled **{appliedCount}** resources ({stageOneCount} in stage one, {stageTwoCount} in stage two), pruned **{prunedCount}**

`,

  /**
   * Footer template for the comment section, with placeholders for dynamic values
   */
  FOOTER_TEMPLATE: `
<hr>

**Summary:** {appliedCount} applied, {prunedCount} pruned

<details>
<summary>ℹ️ How to read this report</summary>

- 1️⃣ **Stage one**: Namespaces and custom resource definitions, applied and converged first
- 2️⃣ **Stage two**: Every other declared resource
- ➖ **Pruned**: Resources applied by a previous run that are no longer declared

Resources are identified by: \`{group}/{kind}/{namespace}/{name}\`
</details>
`
} as const
