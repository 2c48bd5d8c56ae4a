export const JIRA_SEARCH_DESCRIPTION = `
Search Jira issues (limit 20). Input can be natural language (converted to JQL: text ~ "<query>" ORDER BY updated DESC) OR raw JQL (detected via JQL keywords like project, status, =, ~, ORDER BY). If the user gives an issue key (e.g. PROJ-123) fetch it directly; otherwise search first to narrow scope.

Examples (JQL):
- Find Epics: issuetype = Epic
- Issues in Epic / parent: parent = PROJ-123
- By status: status = 'In Progress'
- By assignee: assignee = currentUser()
- Recently updated: updated >= -7d
- By label: labels = frontend
- Multiple labels: labels in (frontend, ui)
- By component (team): component = Backend   ("component" often maps to team)
- Exact phrase in summary: summary ~ '"payment failure"'

Notes:
- Use labels or components when asked "by label" or "by team" (map team -> component).
- Quote values with spaces or special characters.

Returns up to 20 issues: id=issue key, title=summary, url=browse URL for citation.`;

export const JIRA_FETCH_DESCRIPTION =
	'Fetch a Jira issue by key (for example PROJ-123). Returns id, title, text (summary, description, status, top 5 comments) and url, plus metadata (source=jira, status, issueType, priority, assignee, reporter, labels, created, updated, commentsExcerpt).';

export const CONFLUENCE_SEARCH_DESCRIPTION = `
Search Confluence pages (limit 20). Query may be simple text (e.g. "project documentation"), sent as text ~ "<text>", OR full CQL. When the server has a default space configured, results are limited to it.

Examples (CQL):
- Search by title: title ~ "Meeting Notes"
- Recent content: created >= "2024-01-01"
- With label: label = documentation
- Multiple labels: label in ("howto", "runbook")
- Recently modified: lastModified > startOfMonth("-1M")
- You contributed recently: contributor = currentUser() AND lastModified > startOfWeek()
- Personal space: space = "~username"   (personal space keys starting with ~ must be quoted)

Returns up to 20 pages with id=page id, title=page title, url=citation URL for a follow-up fetch.`;

export const CONFLUENCE_FETCH_DESCRIPTION =
	'Fetch a Confluence page by id. Returns id, title, text (page body as plain text) and url, plus metadata (source=confluence, type, status, space, created, updated, creator, labels, version). Use after search for detailed context or citation.';
