/**
 * Shared axios setup for the GitLab and Gitea clients
 */

import axios, { AxiosInstance } from 'axios';

/**
 * "https://gitlab.example.com/" + "/api/v4" -> "https://gitlab.example.com/api/v4"
 */
export function apiBaseUrl(serverUrl: string, apiPath: string): string {
  return serverUrl.replace(/\/+$/, '') + apiPath;
}

export function createHttpClient(baseURL: string, authorization: string, userAgent: string): AxiosInstance {
  return axios.create({
    baseURL,
    headers: {
      Authorization: authorization,
      Accept: 'application/json',
      'User-Agent': userAgent,
    },
  });
}

/**
 * Parse a date-only ("2025-03-01") or RFC 3339 timestamp; dates land on UTC midnight
 */
export function parseApiDate(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }

  const date = /^\d{4}-\d{2}-\d{2}$/.test(value) ? new Date(`${value}T00:00:00Z`) : new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}
