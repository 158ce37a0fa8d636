import { NEWS_CATEGORIES } from '../../domain/models/news-article.model';
import { escapeHtml } from './html';

export const HTMX_SRC = 'https://unpkg.com/htmx.org@1.9.12';
export const BOOTSTRAP_CSS =
  'https://cdn.jsdelivr.net/npm/bootstrap@5.3.3/dist/css/bootstrap.min.css';

function pollingPanel(title: string, id: string, url: string, trigger: string): string {
  return `
      <div class="col">
        <div class="card h-100">
          <div class="card-header">${title}</div>
          <div class="card-body" id="${id}" hx-get="${url}" hx-trigger="${trigger}" hx-swap="innerHTML">
            <span class="text-muted">Loading...</span>
          </div>
        </div>
      </div>`;
}

/**
 * Dashboard shell. Every panel loads its fragment on page load and then
 * polls it with htmx.
 */
export function renderIndexPage(pollingIntervalSeconds: number, defaultSymbol: string): string {
  const trigger = `load, every ${pollingIntervalSeconds}s`;
  const categories = NEWS_CATEGORIES.map(
    (category) => `<option value="${category}">${category}</option>`,
  ).join('');

  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>Ticker Board</title>
    <link rel="stylesheet" href="${BOOTSTRAP_CSS}">
    <script src="${HTMX_SRC}"></script>
  </head>
  <body class="bg-light">
    <main class="container py-4">
      <h1 class="h3 mb-4">Ticker Board</h1>
      <div class="row row-cols-1 row-cols-lg-3 g-3 mb-3">${pollingPanel('Most Active', 'most-active', '/data/most-active', trigger)}${pollingPanel('Top Gainers', 'gainers', '/data/gainers', trigger)}${pollingPanel('Top Losers', 'losers', '/data/losers', trigger)}
      </div>
      <div class="row row-cols-1 row-cols-lg-2 g-3">
        <div class="col">
          <div class="card h-100">
            <div class="card-header">
              <form class="d-flex gap-2" hx-get="/data/profile" hx-target="#profile">
                <input class="form-control form-control-sm" name="symbol" value="${escapeHtml(defaultSymbol)}" aria-label="Symbol">
                <button class="btn btn-sm btn-primary" type="submit">Lookup</button>
              </form>
            </div>
            <div class="card-body" id="profile" hx-get="/data/profile?symbol=${encodeURIComponent(defaultSymbol)}" hx-trigger="load">
              <span class="text-muted">Loading...</span>
            </div>
          </div>
        </div>
        <div class="col">
          <div class="card h-100">
            <div class="card-header">
              <select class="form-select form-select-sm" name="category" hx-get="/data/news" hx-target="#news" aria-label="News category">${categories}</select>
            </div>
            <div class="card-body" id="news" hx-get="/data/news" hx-include="[name='category']" hx-trigger="${trigger}">
              <span class="text-muted">Loading...</span>
            </div>
          </div>
        </div>
      </div>
    </main>
  </body>
</html>
`;
}
