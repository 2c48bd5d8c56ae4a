import { ApiError, NotFoundError, errorMessage } from '../http/errors.js';
import { RestClient, type TransportOptions } from '../http/restClient.js';
import { log } from '../log.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import type {
	ComponentInfo,
	ComponentInput,
	ComponentUpdate,
	CustomFieldInfo,
	JiraComment,
	JiraComponent,
	JiraCreatedIssue,
	JiraField,
	JiraGroup,
	JiraGroupMembersPage,
	JiraGroupPickerResponse,
	JiraIssue,
	JiraIssueType,
	JiraProject,
	JiraProjectRole,
	JiraSearchResponse,
	JiraTokenSearchResponse,
	JiraUser,
	SearchIssuesOptions,
	UserRoleInfo,
} from '../types/jira.js';
import { quote } from '../utils/query.js';

const API = '/rest/api/2';
const SEARCH_PAGE_MAX = 100;
const GROUP_PAGE_SIZE = 50;
const USER_SEARCH_MAX = 1000;
const FIELD_SAMPLE_SIZE = 50;
const USER_ROLE_ACTOR = 'atlassian-user-role-actor';

export interface JiraClientOptions extends TransportOptions {
	/** Site URL, e.g. `https://your-site.atlassian.net`. */
	baseUrl: string;
	/** Account email. */
	username: string;
	apiToken: string;
}

export interface IterateIssuesOptions {
	pageSize?: number;
	fields?: string | string[];
	startAt?: number;
}

/**
 * Jira REST v2 client. Methods throw `ApiError` subclasses on failure, except
 * `testConnection`, which reports and returns false.
 */
export class JiraClient {
	readonly baseUrl: string;
	readonly username: string;
	private readonly http: RestClient;
	/** Set once the site answers 410 Gone for `/search`. */
	private tokenSearch = false;

	constructor(options: JiraClientOptions) {
		const { baseUrl, username, apiToken, ...transport } = options;
		this.baseUrl = baseUrl.replace(/\/+$/, '');
		this.username = username;
		this.http = new RestClient({
			...transport,
			service: 'jira',
			baseUrl: this.baseUrl,
			username,
			apiToken,
		});
	}

	issueUrl(issueKey: string): string {
		return `${this.baseUrl}/browse/${issueKey}`;
	}

	async testConnection(): Promise<boolean> {
		try {
			const me = await this.http.get<JiraUser>(`${API}/myself`);
			log({
				evt: 'jira_connected',
				msg: `connected as ${me.displayName || 'Unknown'}`,
				client: 'jira',
				url: this.baseUrl,
			});
			return true;
		} catch (e) {
			log({
				evt: 'jira_connect_failed',
				msg: 'connection failed',
				lvl: 'error',
				client: 'jira',
				url: this.baseUrl,
				reason: errorMessage(e),
			});
			return false;
		}
	}

	// ------------------ Issues ------------------

	async getIssue(issueKey: string, fields?: string | string[]): Promise<JiraIssue> {
		const issue = await this.http.get<JiraIssue>(`${API}/issue/${encodeURIComponent(issueKey)}`, {
			fields,
		});
		log({
			evt: 'jira_issue_get',
			msg: `retrieved ${issue.key} - ${stringField(issue.fields, 'summary')}`,
			client: 'jira',
			key: issue.key,
		});
		return issue;
	}

	/**
	 * Walks a JQL result set page by page. Sites that have retired `/search` are read through
	 * `/search/jql`, which pages by token, so `startAt` is applied by skipping.
	 */
	async *iterateIssues(jql: string, options: IterateIssuesOptions = {}): AsyncGenerator<JiraIssue> {
		const pageSize = Math.min(Math.max(options.pageSize ?? SEARCH_PAGE_MAX, 1), SEARCH_PAGE_MAX);
		let startAt = options.startAt ?? 0;
		for (;;) {
			const page = await this.offsetPage(jql, startAt, pageSize, options.fields);
			if (!page) break;
			const issues = page.issues ?? [];
			for (const issue of issues) yield issue;
			startAt += issues.length;
			if (!issues.length || startAt >= page.total) return;
		}

		let skip = startAt;
		let nextPageToken: string | undefined;
		for (;;) {
			const page = await this.http.get<JiraTokenSearchResponse>(`${API}/search/jql`, {
				jql,
				maxResults: pageSize,
				fields: options.fields ?? '*navigable',
				nextPageToken,
			});
			const issues = page.issues ?? [];
			for (const issue of issues) {
				if (skip > 0) skip--;
				else yield issue;
			}
			nextPageToken = page.nextPageToken ?? undefined;
			if (page.isLast || !nextPageToken || !issues.length) return;
		}
	}

	private async offsetPage(
		jql: string,
		startAt: number,
		maxResults: number,
		fields?: string | string[],
	): Promise<JiraSearchResponse | undefined> {
		if (this.tokenSearch) return undefined;
		try {
			return await this.http.get<JiraSearchResponse>(`${API}/search`, { jql, startAt, maxResults, fields });
		} catch (e) {
			if (!(e instanceof ApiError) || e.status !== 410) throw e;
			this.tokenSearch = true;
			log({
				evt: 'jira_search_fallback',
				msg: '/search is gone, using /search/jql',
				lvl: 'warn',
				client: 'jira',
				url: this.baseUrl,
			});
			return undefined;
		}
	}

	async searchIssues(jql: string, options: SearchIssuesOptions = {}): Promise<JiraIssue[]> {
		const maxResults = options.maxResults ?? 50;
		const pageSize = maxResults > 0 ? Math.min(maxResults, SEARCH_PAGE_MAX) : SEARCH_PAGE_MAX;
		const issues: JiraIssue[] = [];
		for await (const issue of this.iterateIssues(jql, {
			pageSize,
			fields: options.fields,
			startAt: options.startAt,
		})) {
			issues.push(issue);
			if (maxResults > 0 && issues.length >= maxResults) break;
		}
		log({
			evt: 'jira_search',
			msg: `found ${issues.length} issues`,
			client: 'jira',
			query: jql,
			count: issues.length,
		});
		return issues;
	}

	/** Extra fields are merged last and win over the defaults. */
	async createIssue(
		projectKey: string,
		summary: string,
		description = '',
		issueType = 'Task',
		extraFields: JsonObject = {},
	): Promise<JiraIssue> {
		const fields: JsonObject = {
			project: { key: projectKey },
			summary,
			description,
			issuetype: { name: issueType },
			...extraFields,
		};
		const created = await this.http.post<JiraCreatedIssue>(`${API}/issue`, { fields });
		log({
			evt: 'jira_issue_create',
			msg: `created ${created.key} - ${summary}`,
			client: 'jira',
			key: created.key,
		});
		return this.getIssue(created.key);
	}

	async updateIssue(issueKey: string, fields: JsonObject): Promise<void> {
		await this.http.put<void>(`${API}/issue/${encodeURIComponent(issueKey)}`, { fields });
		log({ evt: 'jira_issue_update', msg: `updated ${issueKey}`, client: 'jira', key: issueKey });
	}

	async addComment(issueKey: string, body: string): Promise<JiraComment> {
		const comment = await this.http.post<JiraComment>(
			`${API}/issue/${encodeURIComponent(issueKey)}/comment`,
			{ body },
		);
		log({ evt: 'jira_comment_add', msg: `commented on ${issueKey}`, client: 'jira', key: issueKey });
		return comment;
	}

	async getIssueTypes(): Promise<JiraIssueType[]> {
		const types = await this.http.get<JiraIssueType[]>(`${API}/issuetype`);
		log({ evt: 'jira_issue_types', msg: `found ${types.length} issue types`, client: 'jira', count: types.length });
		return types;
	}

	async getFields(): Promise<JiraField[]> {
		return this.http.get<JiraField[]>(`${API}/field`);
	}

	// ------------------ Projects ------------------

	async getProjects(): Promise<JiraProject[]> {
		const projects = await this.http.get<JiraProject[]>(`${API}/project`);
		log({ evt: 'jira_projects', msg: `found ${projects.length} projects`, client: 'jira', count: projects.length });
		return projects;
	}

	async getProject(projectKey: string): Promise<JiraProject> {
		const project = await this.http.get<JiraProject>(`${API}/project/${encodeURIComponent(projectKey)}`);
		log({
			evt: 'jira_project_get',
			msg: `retrieved ${project.key} - ${project.name}`,
			client: 'jira',
			key: project.key,
		});
		return project;
	}

	async getProjectComponents(projectKey: string): Promise<ComponentInfo[]> {
		const project = await this.requireProject(projectKey);
		const components = await this.http.get<JiraComponent[]>(
			`${API}/project/${encodeURIComponent(projectKey)}/components`,
		);
		const list = components.map(c => toComponentInfo(c, projectKey, project.name));
		log({
			evt: 'jira_components',
			msg: `found ${list.length} components in ${projectKey}`,
			client: 'jira',
			key: projectKey,
			count: list.length,
		});
		return list;
	}

	/** An unknown lead is reported and the component is created without one. */
	async createComponent(
		projectKey: string,
		name: string,
		input: ComponentInput = {},
	): Promise<JiraComponent> {
		const body: JsonObject = {
			name,
			project: projectKey,
			assigneeType: input.assigneeType ?? 'UNASSIGNED',
		};
		if (input.description) body.description = input.description;
		if (input.lead) {
			let lead: JiraUser | undefined;
			try {
				lead = await this.findUser(input.lead);
			} catch (e) {
				log({
					evt: 'jira_user_lookup_failed',
					msg: `could not look up '${input.lead}'`,
					lvl: 'warn',
					client: 'jira',
					reason: errorMessage(e),
				});
			}
			if (lead) Object.assign(body, leadRef(lead));
			else
				log({
					evt: 'jira_component_no_lead',
					msg: `creating component without lead '${input.lead}'`,
					lvl: 'warn',
					client: 'jira',
					key: projectKey,
				});
		}
		const component = await this.http.post<JiraComponent>(`${API}/component`, body);
		log({
			evt: 'jira_component_create',
			msg: `created component ${component.name} in ${projectKey}`,
			client: 'jira',
			key: projectKey,
		});
		return component;
	}

	/** Only the provided fields are sent. An unknown lead fails the whole update. */
	async updateComponent(componentId: string, update: ComponentUpdate): Promise<JiraComponent> {
		const path = `${API}/component/${encodeURIComponent(componentId)}`;
		const existing = await this.http.get<JiraComponent>(path);
		const body: JsonObject = {};
		if (update.name) body.name = update.name;
		if (update.description) body.description = update.description;
		if (update.assigneeType) body.assigneeType = update.assigneeType;
		if (update.lead) {
			const lead = await this.findUser(update.lead);
			if (!lead)
				throw new NotFoundError(
					{
						service: 'jira',
						method: 'GET',
						url: this.http.buildUrl(`${API}/user/search`, { query: update.lead }),
						status: 404,
						statusText: 'Not Found',
					},
					`jira user '${update.lead}' not found`,
				);
			Object.assign(body, leadRef(lead));
		}
		const updated = await this.http.put<JiraComponent>(path, body);
		log({
			evt: 'jira_component_update',
			msg: `updated component ${existing.name}`,
			client: 'jira',
			key: componentId,
		});
		return updated;
	}

	/**
	 * Custom fields in use by a project. Fields present on a sample of the project's issues
	 * win; when the sample shows none, or cannot be read, every custom field is returned.
	 */
	async getProjectCustomFields(projectKey: string): Promise<CustomFieldInfo[]> {
		const project = await this.requireProject(projectKey);
		const customFields = (await this.getFields()).filter(f => f.id.startsWith('customfield_'));
		let used = new Set<string>();
		try {
			used = await this.sampleCustomFieldIds(projectKey);
		} catch (e) {
			log({
				evt: 'jira_field_sample_failed',
				msg: 'could not search issues to determine used fields',
				lvl: 'warn',
				client: 'jira',
				key: projectKey,
				reason: errorMessage(e),
			});
		}
		let chosen = customFields.filter(f => used.has(f.id));
		if (!chosen.length) {
			log({
				evt: 'jira_fields_all',
				msg: `no custom fields seen on ${projectKey} issues, returning all ${customFields.length}`,
				client: 'jira',
				key: projectKey,
				count: customFields.length,
			});
			chosen = customFields;
		}
		const infos = chosen.map(f => toCustomFieldInfo(f, projectKey, project.name));
		log({
			evt: 'jira_custom_fields',
			msg: `found ${infos.length} custom fields for ${projectKey}`,
			client: 'jira',
			key: projectKey,
			count: infos.length,
		});
		return infos;
	}

	// ------------------ Users & groups ------------------

	async searchUsers(query: string, maxResults = USER_SEARCH_MAX): Promise<JiraUser[]> {
		return this.http.get<JiraUser[]>(`${API}/user/search`, { query, maxResults });
	}

	/** Best match for a username, email, account id or display name. */
	async findUser(query: string): Promise<JiraUser | undefined> {
		const users = await this.searchUsers(query, 10);
		const q = query.toLowerCase();
		const exact = users.find(u =>
			[u.accountId, u.name, u.key, u.emailAddress, u.displayName].some(
				v => typeof v === 'string' && v.toLowerCase() === q,
			),
		);
		return exact ?? users[0];
	}

	async getGroups(): Promise<JiraGroup[]> {
		const res = await this.http.get<JiraGroupPickerResponse>(`${API}/groups/picker`, {
			maxResults: USER_SEARCH_MAX,
		});
		const groups = res.groups ?? [];
		log({ evt: 'jira_groups', msg: `found ${groups.length} groups`, client: 'jira', count: groups.length });
		return groups;
	}

	async getGroupMembers(groupName: string): Promise<JiraUser[]> {
		const members: JiraUser[] = [];
		let startAt = 0;
		for (;;) {
			const page = await this.http.get<JiraGroupMembersPage>(`${API}/group/member`, {
				groupname: groupName,
				startAt,
				maxResults: GROUP_PAGE_SIZE,
			});
			const values = page.values ?? [];
			members.push(...values);
			startAt += values.length;
			if (page.isLast || !values.length) break;
		}
		log({
			evt: 'jira_group_members',
			msg: `found ${members.length} members in group '${groupName}'`,
			client: 'jira',
			count: members.length,
		});
		return members;
	}

	async getUserGroups(user: JiraUser): Promise<JiraGroup[]> {
		const params = user.accountId ? { accountId: user.accountId } : { username: user.name };
		return this.http.get<JiraGroup[]>(`${API}/user/groups`, params);
	}

	/**
	 * Users with their role or group context. With a project key: members of each project
	 * role. Without: every user the search can see, falling back to group membership when user
	 * search is unavailable.
	 */
	async getUsersWithRoles(projectKey?: string, includeGroups = true): Promise<UserRoleInfo[]> {
		const users = projectKey
			? await this.projectRoleUsers(projectKey)
			: await this.globalUsers(includeGroups);
		log({
			evt: 'jira_users_roles',
			msg: `found ${users.length} users with role information`,
			client: 'jira',
			key: projectKey,
			count: users.length,
		});
		return users;
	}

	private async projectRoleUsers(projectKey: string): Promise<UserRoleInfo[]> {
		const base = `${API}/project/${encodeURIComponent(projectKey)}/role`;
		const roles = await this.http.get<Record<string, JsonValue>>(base);
		const out: UserRoleInfo[] = [];
		for (const [roleName, ref] of Object.entries(roles)) {
			const roleId = roleIdOf(ref);
			if (!roleId) {
				log({
					evt: 'jira_role_skip',
					msg: `could not extract role id for ${roleName}`,
					lvl: 'warn',
					client: 'jira',
					key: projectKey,
				});
				continue;
			}
			try {
				const role = await this.http.get<JiraProjectRole>(`${base}/${roleId}`);
				for (const actor of role.actors ?? []) {
					if (actor.type !== USER_ROLE_ACTOR) continue;
					const u = actor.actorUser;
					out.push({
						userKey: u?.accountId ?? u?.key ?? 'N/A',
						userName: u?.name ?? actor.name ?? 'N/A',
						displayName: u?.displayName ?? actor.displayName ?? 'N/A',
						email: u?.emailAddress ?? 'N/A',
						projectKey,
						role: roleName,
						roleId,
						type: 'project_role',
					});
				}
			} catch (e) {
				log({
					evt: 'jira_role_failed',
					msg: `could not read actors for role ${roleName}`,
					lvl: 'warn',
					client: 'jira',
					key: projectKey,
					reason: errorMessage(e),
				});
			}
		}
		return out;
	}

	private async globalUsers(includeGroups: boolean): Promise<UserRoleInfo[]> {
		let users: JiraUser[];
		try {
			users = await this.searchAllUsers();
		} catch (e) {
			log({
				evt: 'jira_user_search_failed',
				msg: 'user search unavailable, walking group membership',
				lvl: 'warn',
				client: 'jira',
				reason: errorMessage(e),
			});
			return this.groupMemberUsers();
		}
		const out: UserRoleInfo[] = [];
		for (const user of users) {
			const info: UserRoleInfo = { ...identityOf(user), type: 'global_user' };
			if (includeGroups) {
				try {
					info.groups = (await this.getUserGroups(user)).map(g => g.name);
				} catch (e) {
					info.groups = [];
					log({
						evt: 'jira_user_groups_failed',
						msg: `could not get groups for ${info.userName}`,
						lvl: 'warn',
						client: 'jira',
						reason: errorMessage(e),
					});
				}
			}
			out.push(info);
		}
		return out;
	}

	private async searchAllUsers(): Promise<JiraUser[]> {
		try {
			return await this.searchUsers('');
		} catch {
			// some sites reject an empty query; '.' matches nearly every email address
			return this.searchUsers('.');
		}
	}

	private async groupMemberUsers(): Promise<UserRoleInfo[]> {
		const byKey = new Map<string, UserRoleInfo>();
		for (const group of await this.getGroups()) {
			try {
				for (const member of await this.getGroupMembers(group.name)) {
					const id = identityOf(member);
					const existing = byKey.get(id.userKey);
					if (existing) existing.groups = [...(existing.groups ?? []), group.name];
					else byKey.set(id.userKey, { ...id, groups: [group.name], type: 'group_member' });
				}
			} catch (e) {
				log({
					evt: 'jira_group_members_failed',
					msg: `could not get members for group ${group.name}`,
					lvl: 'warn',
					client: 'jira',
					reason: errorMessage(e),
				});
			}
		}
		return [...byKey.values()];
	}

	private async requireProject(projectKey: string): Promise<JiraProject> {
		try {
			return await this.getProject(projectKey);
		} catch (e) {
			if (e instanceof NotFoundError) throw new NotFoundError(e, `jira project '${projectKey}' not found`);
			throw e;
		}
	}

	private async sampleCustomFieldIds(projectKey: string): Promise<Set<string>> {
		const sample = await this.searchIssues(`project = ${quote(projectKey)}`, {
			maxResults: FIELD_SAMPLE_SIZE,
			fields: '*all',
		});
		const ids = new Set<string>();
		for (const issue of sample)
			for (const id of Object.keys(issue.fields ?? {})) if (id.startsWith('customfield_')) ids.add(id);
		return ids;
	}
}

function stringField(fields: JsonObject | undefined, name: string): string {
	const v = fields?.[name];
	return typeof v === 'string' ? v : '';
}

function roleIdOf(ref: JsonValue): string | undefined {
	if (typeof ref === 'string') return ref.replace(/\/+$/, '').split('/').pop() || undefined;
	if (ref && typeof ref === 'object' && !Array.isArray(ref)) {
		const id = ref['id'];
		if (typeof id === 'string' || typeof id === 'number') return String(id) || undefined;
	}
	return undefined;
}

function identityOf(user: JiraUser): Omit<UserRoleInfo, 'type'> {
	const userKey = user.accountId ?? user.key ?? user.name ?? 'unknown';
	const userName = user.name ?? userKey;
	return {
		userKey,
		userName,
		displayName: user.displayName ?? userName,
		email: user.emailAddress ?? 'N/A',
		active: user.active ?? true,
	};
}

function leadRef(user: JiraUser): JsonObject {
	return user.accountId ? { leadAccountId: user.accountId } : { leadUserName: user.name ?? '' };
}

function toComponentInfo(c: JiraComponent, projectKey: string, projectName: string): ComponentInfo {
	return {
		id: c.id,
		name: c.name,
		description: c.description ?? 'No description',
		lead: c.lead ? (c.lead.displayName ?? 'Unknown') : 'No lead assigned',
		leadUsername: c.lead?.name ?? 'N/A',
		assigneeType: c.assigneeType ?? 'UNASSIGNED',
		isAssigneeTypeValid: c.isAssigneeTypeValid ?? false,
		projectKey,
		projectName,
	};
}

function toCustomFieldInfo(f: JiraField, projectKey: string, projectName: string): CustomFieldInfo {
	const schema = f.schema ?? {};
	return {
		id: f.id,
		name: f.name,
		custom: f.custom ?? true,
		orderable: f.orderable ?? false,
		navigable: f.navigable ?? true,
		searchable: f.searchable ?? true,
		clauseNames: f.clauseNames ?? [],
		schema,
		fieldType: schema.type ?? 'Unknown',
		system: schema.system ?? 'Unknown',
		items: schema.items ?? 'N/A',
		projectKey,
		projectName,
	};
}
