/** Jira Cloud builds API, bulk submission. Substitute the cloud id. */
export const BUILDS_API_URL = 'https://api.atlassian.com/jira/builds/0.1/cloud/%s/bulk';

/** Jira Cloud deployments API, bulk submission. Substitute the cloud id. */
export const DEPLOYMENTS_API_URL = 'https://api.atlassian.com/jira/deployments/0.1/cloud/%s/bulk';
