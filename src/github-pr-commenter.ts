import * as github from '@actions/github'
import * as core from '@actions/core'
import { formatReference } from './errors.js'
import { GITHUB, COMMENTS } from './constants.js'
import { ReconcileReport, ResourceReference } from './types.js'

type ReportSection = 'stageOne' | 'stageTwo' | 'pruned'

const SECTIONS: ReportSection[] = ['stageOne', 'stageTwo', 'pruned']

const SECTION_HEADINGS: Record<ReportSection, string> = {
  stageOne: '### 1️⃣ Stage one',
  stageTwo: '### 2️⃣ Stage two',
  pruned: '### ➖ Pruned'
}

/**
 * Handles posting reconciliation reports to GitHub Pull Requests.
 * Formats the applied and pruned resources as comments and manages the
 * comment lifecycle.
 */
export class GitHubPRCommenter {
  private octokit: ReturnType<typeof github.getOctokit>
  private title: string
  private subtitle: string
  private maxCommentLength: number

  /**
   * Creates a new GitHubPRCommenter instance.
   *
   * @param token - GitHub personal access token for API authentication
   * @param title - Custom title for the report comment
   * @param subtitle - Optional subtitle for additional context
   * @param maxCommentLength - Maximum length for a comment before splitting
   */
  constructor(
    token: string,
    title: string = COMMENTS.DEFAULT_TITLE,
    subtitle: string = '',
    maxCommentLength: number = GITHUB.MAX_COMMENT_LENGTH
  ) {
    this.octokit = github.getOctokit(token)
    this.title = title
    this.subtitle = subtitle
    this.maxCommentLength = maxCommentLength
  }

  /**
   * Posts a reconciliation report as comments on a GitHub Pull Request.
   * Falls back to console output if GitHub context is not available.
   * Failing to comment never fails the run.
   */
  async postReport(report: ReconcileReport): Promise<void> {
    const pullRequest = github.context.payload.pull_request
    if (!pullRequest) {
      core.warning('PR context not available, falling back to console output')
      this.printReport(report)
      return
    }

    try {
      await this.minimizeExistingComments(pullRequest.number)

      for (const comment of this.formatReportAsComments(report)) {
        await this.postComment(pullRequest.number, comment)
      }
    } catch (error) {
      core.error(`Failed to post PR comments: ${error}`)
      this.printReport(report)
    }
  }

  /**
   * Minimizes earlier reports from this action so only the latest stays
   * expanded.
   *
   * @param prNumber - Number of the Pull Request to clean up
   */
  private async minimizeExistingComments(prNumber: number): Promise<void> {
    const { owner, repo } = github.context.repo

    try {
      const comments = await this.octokit.rest.issues.listComments({
        owner,
        repo,
        issue_number: prNumber
      })

      const botComments = comments.data.filter(
        (comment) =>
          comment.user?.type === 'Bot' &&
          comment.body?.includes(`🚀 ${this.title}`)
      )

      for (const comment of botComments) {
        await this.octokit.graphql(
          `
            mutation($subjectId: ID!) {
              minimizeComment(input: { subjectId: $subjectId, classifier: OUTDATED }) {
                minimizedComment {
                  isMinimized
                }
              }
            }
          `,
          { subjectId: comment.node_id }
        )
      }
    } catch (error) {
      core.warning(`Failed to minimize existing comments: ${error}`)
    }
  }

  /**
   * Formats a report into comment bodies, splitting across several comments
   * to respect GitHub's comment size limit.
   */
  formatReportAsComments(report: ReconcileReport): string[] {
    const comments: string[] = []

    let currentComment = this.getCommentHeader(report)
    const footer = this.getCommentFooter(report)
    const reservedSpace = footer.length + GITHUB.COMMENT_LENGTH_BUFFER

    for (const section of SECTIONS) {
      const references = report[section]
      if (references.length === 0) {
        continue
      }

      const lines = [
        `${SECTION_HEADINGS[section]}\n`,
        ...references.map((reference) => this.formatReferenceLine(reference))
      ]
      for (const line of lines) {
        if (
          currentComment.length + line.length + reservedSpace >
          this.maxCommentLength
        ) {
          comments.push(currentComment + COMMENTS.CONTINUATION_TEXT)
          currentComment = this.replacePlaceholders(
            COMMENTS.CONTINUATION_HEADER,
            { title: this.title }
          )
        }
        currentComment += line
      }
      currentComment += '\n'
    }

    currentComment += footer
    comments.push(currentComment)

    core.info(`Formatted ${comments.length} comments for PR`)

    return comments
  }

  private getCommentHeader(report: ReconcileReport): string {
    return this.replacePlaceholders(COMMENTS.HEADER_TEMPLATE, {
      ...this.getCounts(report),
      title: this.title,
      subtitle: this.subtitle ? `\n${this.subtitle}\n` : ''
    })
  }

  private getCommentFooter(report: ReconcileReport): string {
    return this.replacePlaceholders(
      COMMENTS.FOOTER_TEMPLATE,
      this.getCounts(report)
    )
  }

  private formatReferenceLine(reference: ResourceReference): string {
    return `- \`${formatReference(reference)}\`\n`
  }

  private getCounts(report: ReconcileReport): {
    appliedCount: number
    stageOneCount: number
    stageTwoCount: number
    prunedCount: number
  } {
    return {
      appliedCount: report.stageOne.length + report.stageTwo.length,
      stageOneCount: report.stageOne.length,
      stageTwoCount: report.stageTwo.length,
      prunedCount: report.pruned.length
    }
  }

  /**
   * Replaces `{key}` placeholders with the given values. Unknown keys are
   * left as they are.
   */
  private replacePlaceholders(
    template: string,
    values: Record<string, string | number>
  ): string {
    return template.replace(/{(\w+)}/g, (match, key: string) =>
      key in values ? values[key].toString() : match
    )
  }

  private async postComment(prNumber: number, body: string): Promise<void> {
    const { owner, repo } = github.context.repo

    await this.octokit.rest.issues.createComment({
      owner,
      repo,
      issue_number: prNumber,
      body
    })
  }

  /**
   * Prints the report to the console as a fallback when the GitHub API is
   * not available.
   */
  printReport(report: ReconcileReport): void {
    const counts = this.getCounts(report)
    core.info(`\n🚀 ${this.title}`)

    for (const section of SECTIONS) {
      for (const reference of report[section]) {
        core.info(`${section}: ${formatReference(reference)}`)
      }
    }

    core.info(
      `Summary: ${counts.appliedCount} applied, ${counts.prunedCount} pruned`
    )
  }
}
