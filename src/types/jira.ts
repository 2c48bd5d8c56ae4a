import type { JsonObject, JsonValue } from './json.js';

export interface JiraUser {
	self?: string;
	key?: string;
	name?: string;
	accountId?: string;
	displayName?: string;
	emailAddress?: string;
	active?: boolean;
}

export interface JiraIssue {
	id: string;
	key: string;
	self?: string;
	fields: JsonObject;
}

export interface JiraSearchResponse {
	startAt: number;
	maxResults: number;
	total: number;
	issues: JiraIssue[];
}

/** `/search/jql` page: token-paged, without totals. */
export interface JiraTokenSearchResponse {
	issues?: JiraIssue[];
	nextPageToken?: string | null;
	isLast?: boolean;
}

export interface JiraCreatedIssue {
	id: string;
	key: string;
	self: string;
}

export interface JiraProject {
	id: string;
	key: string;
	name: string;
	self?: string;
	projectTypeKey?: string;
	lead?: JiraUser;
}

export interface JiraIssueType {
	id: string;
	name: string;
	description?: string;
	subtask?: boolean;
}

export interface JiraComment {
	id: string;
	body: JsonValue;
	author?: JiraUser;
	created?: string;
	updated?: string;
}

export interface JiraGroup {
	name: string;
	groupId?: string;
}

export interface JiraGroupPickerResponse {
	total?: number;
	groups: JiraGroup[];
}

export interface JiraGroupMembersPage {
	startAt: number;
	maxResults: number;
	total: number;
	isLast: boolean;
	values: JiraUser[];
}

export interface JiraRoleActor {
	id?: number;
	type: string;
	name?: string;
	displayName?: string;
	actorUser?: JiraUser & { accountId?: string };
}

export interface JiraProjectRole {
	id: number;
	name: string;
	actors?: JiraRoleActor[];
}

export type ComponentAssigneeType =
	| 'PROJECT_DEFAULT'
	| 'COMPONENT_LEAD'
	| 'PROJECT_LEAD'
	| 'UNASSIGNED';

export interface JiraComponent {
	id: string;
	name: string;
	self?: string;
	description?: string;
	lead?: JiraUser;
	assigneeType?: ComponentAssigneeType;
	isAssigneeTypeValid?: boolean;
	project?: string;
}

export interface JiraField {
	id: string;
	name: string;
	custom?: boolean;
	orderable?: boolean;
	navigable?: boolean;
	searchable?: boolean;
	clauseNames?: string[];
	schema?: { type?: string; system?: string; items?: string; custom?: string; customId?: number };
}

export interface ComponentInfo {
	id: string;
	name: string;
	description: string;
	lead: string;
	leadUsername: string;
	assigneeType: ComponentAssigneeType;
	isAssigneeTypeValid: boolean;
	projectKey: string;
	projectName: string;
}

export interface CustomFieldInfo {
	id: string;
	name: string;
	custom: boolean;
	orderable: boolean;
	navigable: boolean;
	searchable: boolean;
	clauseNames: string[];
	schema: NonNullable<JiraField['schema']>;
	fieldType: string;
	system: string;
	items: string;
	projectKey: string;
	projectName: string;
}

export type UserRoleSource = 'project_role' | 'global_user' | 'group_member';

export interface UserRoleInfo {
	userKey: string;
	userName: string;
	displayName: string;
	email: string;
	type: UserRoleSource;
	active?: boolean;
	groups?: string[];
	projectKey?: string;
	role?: string;
	roleId?: string;
}

export interface SearchIssuesOptions {
	/** Issues to collect; 0 collects every match. */
	maxResults?: number;
	fields?: string | string[];
	startAt?: number;
}

export interface ComponentInput {
	description?: string;
	/** Username, email or account id, resolved through user search. */
	lead?: string;
	assigneeType?: ComponentAssigneeType;
}

export interface ComponentUpdate extends ComponentInput {
	name?: string;
}
