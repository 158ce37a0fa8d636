import { DateTime } from 'luxon';

import { CompanyProfile } from '../../domain/models/company-profile.model';
import { NewsArticle, NewsCategory } from '../../domain/models/news-article.model';
import {
  ScreenerRow,
  ScreenerSignal,
  screenerLabel,
} from '../../domain/models/screener.model';
import { escapeHtml, safeUrl } from './html';

const NEWS_TIME_FORMAT = 'LLL d, yyyy HH:mm ZZZZ';

const SCREENER_TITLES: Record<ScreenerSignal, string> = {
  most_active: 'Most Active',
  gainers: 'Top Gainers',
  losers: 'Top Losers',
};

export function formatChange(change: number): string {
  return `${change >= 0 ? '+' : ''}${change.toFixed(2)}%`;
}

export function formatPrice(price: number): string {
  return `$${price.toFixed(2)}`;
}

export function formatVolume(volume: number): string {
  return volume > 0 ? volume.toLocaleString('en-US') : 'n/a';
}

function updatedLine(updatedAt: string): string {
  return `<small class="text-muted">Updated ${escapeHtml(updatedAt)}</small>`;
}

export function renderScreenerTable(
  signal: ScreenerSignal,
  rows: readonly ScreenerRow[],
  updatedAt: string,
): string {
  const body = rows.length
    ? rows
        .map((row) => {
          const changeClass = row.change >= 0 ? 'text-success' : 'text-danger';
          return (
            '<tr>' +
            `<td><strong>${escapeHtml(row.ticker)}</strong></td>` +
            `<td>${escapeHtml(row.name)}</td>` +
            `<td>${formatPrice(row.price)}</td>` +
            `<td>${formatPrice(row.high)}</td>` +
            `<td>${formatPrice(row.low)}</td>` +
            `<td>${formatVolume(row.volume)}</td>` +
            `<td class="${changeClass}">${formatChange(row.change)}</td>` +
            '</tr>'
          );
        })
        .join('')
    : `<tr><td colspan="7" class="text-center text-muted">No ${screenerLabel(signal)} data</td></tr>`;

  return (
    `<div class="screener" data-signal="${signal}">` +
    `<h5>${SCREENER_TITLES[signal]}</h5>` +
    '<table class="table table-sm table-hover">' +
    '<thead><tr><th>Ticker</th><th>Name</th><th>Price</th><th>High</th><th>Low</th>' +
    '<th>Volume</th><th>Change</th></tr></thead>' +
    `<tbody>${body}</tbody>` +
    '</table>' +
    updatedLine(updatedAt) +
    '</div>'
  );
}

export function renderCompanyProfile(profile: CompanyProfile, updatedAt: string): string {
  const logo = profile.logo
    ? `<img src="${safeUrl(profile.logo)}" alt="${escapeHtml(profile.name)} logo" class="me-3" width="48" height="48">`
    : '';
  const website = profile.webUrl
    ? `<a href="${safeUrl(profile.webUrl)}" target="_blank" rel="noopener noreferrer">${escapeHtml(profile.webUrl)}</a>`
    : 'n/a';

  return (
    '<div class="card company-profile"><div class="card-body">' +
    `<div class="d-flex align-items-center mb-2">${logo}` +
    `<h5 class="card-title mb-0">${escapeHtml(profile.name)} ` +
    `<span class="badge bg-secondary">${escapeHtml(profile.ticker)}</span></h5></div>` +
    '<dl class="row mb-0">' +
    `<dt class="col-sm-4">Exchange</dt><dd class="col-sm-8">${escapeHtml(profile.exchange)}</dd>` +
    `<dt class="col-sm-4">Industry</dt><dd class="col-sm-8">${escapeHtml(profile.industry)}</dd>` +
    `<dt class="col-sm-4">Website</dt><dd class="col-sm-8">${website}</dd>` +
    '</dl>' +
    updatedLine(updatedAt) +
    '</div></div>'
  );
}

export function formatNewsTime(publishedAt: number, zone?: string): string {
  return DateTime.fromMillis(publishedAt, { zone, locale: 'en-US' }).toFormat(NEWS_TIME_FORMAT);
}

export function renderNewsFeed(
  category: NewsCategory,
  articles: readonly NewsArticle[],
  updatedAt: string,
  zone?: string,
): string {
  const items = articles.length
    ? articles
        .map((article) => {
          const summary = article.summary
            ? `<p class="mb-1 small">${escapeHtml(article.summary)}</p>`
            : '';
          return (
            '<li class="list-group-item">' +
            `<a href="${safeUrl(article.url)}" target="_blank" rel="noopener noreferrer">` +
            `${escapeHtml(article.headline)}</a>${summary}` +
            `<small class="text-muted">${escapeHtml(article.source)} · ` +
            `${escapeHtml(formatNewsTime(article.publishedAt, zone))}</small>` +
            '</li>'
          );
        })
        .join('')
    : `<li class="list-group-item text-muted">No ${category} news</li>`;

  return (
    `<div class="news-feed" data-category="${category}">` +
    `<ul class="list-group list-group-flush">${items}</ul>` +
    updatedLine(updatedAt) +
    '</div>'
  );
}

export function renderErrorFragment(label: string, reason: string, updatedAt: string): string {
  return (
    '<div class="alert alert-warning mb-0" role="alert">' +
    `Failed to load ${escapeHtml(label)} data: ${escapeHtml(reason)} ` +
    updatedLine(updatedAt) +
    '</div>'
  );
}
