import { load } from 'cheerio';
import { RawAssignment } from '../types/index.js';
import { describeError, SourceError, sourceError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { err, ok, Result } from '../utils/result.js';

const DEADLINE_HEADING = 'مهلت تمرین\u200cهای پیش رو';

const SELECTORS = {
  assignment: 'div.css-ardi2f',
  day: 'span.css-lvorr0',
  month: 'span.css-itvw0n',
  titleLink: 'a.css-15qlil8',
  course: 'span.css-x4152s',
};

const HEADERS = {
  accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'user-agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
};

/** Where assignment deadlines come from, keyed by the tenant's portal session. */
export interface AssignmentSource {
  fetchAssignments(session: string): Promise<Result<RawAssignment[], SourceError>>;
  validateSession(session: string): Promise<Result<void, SourceError>>;
}

/**
 * Extracts the upcoming-deadline rows from the course page. Returns null
 * when the page has no deadline section at all.
 */
export function parseAssignments(html: string, baseUrl: string): RawAssignment[] | null {
  const $ = load(html);

  const heading = $('h2').filter((_, el) => $(el).text().trim() === DEADLINE_HEADING);
  if (heading.length === 0) return null;

  const assignments: RawAssignment[] = [];
  $(SELECTORS.assignment).each((_, div) => {
    const row = $(div);
    const day = row.find(SELECTORS.day).first().text().trim();
    const month = row.find(SELECTORS.month).first().text().trim();
    const titleLink = row.find(SELECTORS.titleLink).first();
    const title = titleLink.text().trim();
    const href = titleLink.attr('href');
    const course = row.find(SELECTORS.course).first().text().trim();

    if (!day || !month || !title || !course) return;

    assignments.push({
      title,
      course,
      dateText: `${day} ${month}`,
      link: href ? new URL(href, baseUrl).toString() : '',
    });
  });

  return assignments;
}

export class QueraScraper implements AssignmentSource {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
    private readonly logger: Logger
  ) {}

  private async fetchCoursePage(session: string): Promise<Result<string, SourceError>> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/course`, {
        headers: { ...HEADERS, cookie: `session_id=${session}` },
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      this.logger.error(`Request error: ${describeError(error)}`);
      return err(sourceError('unreachable', `Quera could not be reached: ${describeError(error)}`));
    }

    // Quera answers an expired session with a redirect to its login page.
    if (response.url.includes('login')) {
      this.logger.warn('Got redirected to login page. Session is no longer valid.');
      return err(sourceError('session_invalid', 'Quera session is invalid or expired'));
    }
    if (!response.ok) {
      return err(sourceError('unreachable', `Quera responded with HTTP ${response.status}`));
    }

    try {
      return ok(await response.text());
    } catch (error) {
      return err(sourceError('unreachable', `Could not read Quera response: ${describeError(error)}`));
    }
  }

  async fetchAssignments(session: string): Promise<Result<RawAssignment[], SourceError>> {
    this.logger.info('Starting Quera assignment scraping');

    const page = await this.fetchCoursePage(session);
    if (!page.ok) return page;

    const assignments = parseAssignments(page.value, this.baseUrl);
    if (assignments === null) {
      this.logger.warn('Could not find deadline section');
      return ok([]);
    }

    this.logger.info(`Found ${assignments.length} upcoming assignments`);
    return ok(assignments);
  }

  async validateSession(session: string): Promise<Result<void, SourceError>> {
    const page = await this.fetchCoursePage(session);
    return page.ok ? ok(undefined) : page;
  }
}
