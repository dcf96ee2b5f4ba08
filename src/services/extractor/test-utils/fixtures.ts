/**
 * HTML builders mimicking the markup blog pages are served with
 */

export const DOMAIN = 'example.hatenablog.com';
export const BASE_URL = `https://${DOMAIN}`;

export interface ArticleFixture {
  /** Entry path, e.g. `2024/01/02/123456` */
  entry: string;
  title?: string;
  datetime?: string;
  /** URLs of qualifying (`hatena-fotolife`) images */
  images?: string[];
  /** Extra markup placed inside the content region */
  extraContent?: string;
}

export function imageUrl(entry: string, index: number): string {
  const stamp = entry.replace(/\//g, '');
  return `https://cdn.example.com/images/fotolife/e/example/${stamp}/${stamp}_${index}.jpg`;
}

export function fotolifeImage(src: string): string {
  return `<span itemscope itemtype="http://schema.org/Photograph"><img src="${src}" alt="" width="1200" height="800" loading="lazy" title="" class="hatena-fotolife" itemprop="image" /></span>`;
}

export function articleBody(fixture: ArticleFixture): string {
  const datetime = fixture.datetime ?? '2024-01-02T03:04:05Z';
  const images = (fixture.images ?? []).map(src => `<p>${fotolifeImage(src)}</p>`).join('\n');
  return `
  <div class="entry-inner">
    <header class="entry-header">
      <div class="date entry-date first">
        <a href="${BASE_URL}/archive/2024/01/02" rel="nofollow">
          <time datetime="${datetime}" title="${datetime}"><span class="date-year">2024</span></time>
        </a>
      </div>
      <h1 class="entry-title">
        <a href="${BASE_URL}/entry/${fixture.entry}" class="entry-title-link bookmark">${fixture.title ?? `Post ${fixture.entry}`}</a>
      </h1>
    </header>
    <div class="entry-content hatenablog-entry">
      <p>Some text.</p>
      ${images}
      ${fixture.extraContent ?? ''}
    </div>
  </div>
`;
}

export function article(fixture: ArticleFixture): string {
  return `<article class="entry h-entry js-entry-article" data-keyword-campaign="">${articleBody(fixture)}</article>`;
}

export function noEntryArticle(): string {
  return '<article class="entry no-entry"><div class="entry-inner"><p>Not found</p></div></article>';
}

export function archiveSection(entry: string): string {
  return `
<section class="archive-entry test-archive-entry autopagerize_page_element" data-uuid="${entry.replace(/\//g, '')}">
  <div class="archive-entry-header">
    <div class="date archive-date"><a href="${BASE_URL}/archive/2024/01/02" rel="nofollow"><time datetime="2024-01-02T03:04:05Z">2024-01-02</time></a></div>
    <h1 class="entry-title"><a class="entry-title-link" href="${BASE_URL}/entry/${entry}">Post ${entry}</a></h1>
  </div>
  <div class="archive-entry-body"><p class="entry-description">Summary</p></div>
</section>`;
}

export function pagerNext(href: string): string {
  return `<div class="pager autopagerize_insert_before">
  <span class="pager-next">
    <a href="${href}" rel="next">Next</a>
  </span>
</div>`;
}

/**
 * A complete page document
 * @param bodyClass Value of the `class` attribute on `<body>`
 * @param content Markup placed inside the main column
 * @param nextHref Href of the `pager-next` link, if the page has one
 */
export function page(bodyClass: string, content: string, nextHref?: string): string {
  return `<!DOCTYPE html>
<html lang="ja" data-admin-domain="//blog.hatena.ne.jp">
<head><meta charset="utf-8"><title>Example</title></head>
<body class="${bodyClass}">
<div id="container"><div id="main"><div id="main-inner">
${content}
${nextHref === undefined ? '' : pagerNext(nextHref)}
</div></div></div>
</body>
</html>`;
}

export function fullPage(articles: string[], nextHref?: string): string {
  return page('page-index header-image-enable enable-top-editarea', articles.join('\n'), nextHref);
}

export function archivePage(entries: string[], nextHref?: string): string {
  return page('page-archive header-image-enable', entries.map(archiveSection).join('\n'), nextHref);
}
