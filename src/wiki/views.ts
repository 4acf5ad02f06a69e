import { Capabilities, Page } from '../shared/types';

// Minimal HTML for the browser routes. Page text is shown raw, not rendered.

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function layout(title: string, body: string, login?: string): string {
  const nav = login
    ? `<nav><a href="/">Home</a> | ${escapeHtml(login)} | <a href="/logout">Logout</a></nav>`
    : '';
  return [
    '<!DOCTYPE html>',
    '<html>',
    `<head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>`,
    `<body>${nav}<h1>${escapeHtml(title)}</h1>${body}</body>`,
    '</html>',
  ].join('\n');
}

function pageLink(name: string): string {
  return `<a href="/wiki/${encodeURIComponent(name)}">${escapeHtml(name)}</a>`;
}

export function renderIndex(pages: string[], capabilities: Capabilities, login: string): string {
  const list = pages.length
    ? `<ul>${pages.map((name) => `<li>${pageLink(name)}</li>`).join('')}</ul>`
    : '<p>The wiki is currently empty!</p>';

  // Hints only: every form target re-checks the capability server-side
  const createForm = capabilities.canCreate
    ? '<form action="/create" method="post">' +
      '<input type="text" name="name" placeholder="New page name">' +
      '<button type="submit">Create</button></form>'
    : '';

  return layout('Wiki home', list + createForm, login);
}

export function renderPage(
  name: string,
  page: Page | null,
  fallbackContent: string,
  capabilities: Capabilities,
  login: string
): string {
  const content = page ? page.content : fallbackContent;
  const parts = [`<pre>${escapeHtml(content)}</pre>`];
  const hiddenName = `<input type="hidden" name="name" value="${escapeHtml(name)}">`;

  const canEdit = page ? capabilities.canUpdate : capabilities.canCreate;
  if (canEdit) {
    parts.push(
      `<form action="${page ? '/save' : '/create'}" method="post">${hiddenName}` +
        `<textarea name="markdown">${escapeHtml(content)}</textarea>` +
        '<button type="submit">Save</button></form>'
    );
  }
  if (page && capabilities.canDelete) {
    parts.push(`<form action="/delete" method="post">${hiddenName}<button type="submit">Delete</button></form>`);
  }

  return layout(name, parts.join('\n'), login);
}

export function renderLogin(options: { error: boolean; returnUrl: string | null }): string {
  const error = options.error ? '<p class="error">Invalid login or password.</p>' : '';
  const returnUrl = options.returnUrl
    ? `<input type="hidden" name="return_url" value="${escapeHtml(options.returnUrl)}">`
    : '';
  return layout(
    'Login',
    `${error}<form action="/login" method="post">` +
      '<input type="text" name="username" placeholder="login">' +
      '<input type="password" name="password" placeholder="password">' +
      `${returnUrl}<button type="submit">Login</button></form>`
  );
}
