import PDFDocument from 'pdfkit';
import { PRINT_LAYOUT } from '@churchbooks/shared';

// Positions in points from the top of a letter page.
const LEFT = 30;
const TITLE_TOP = 30;
const RULE_TOP = 45;
const SUBTITLE_TOP = 62;
const FIRST_PAGE_LINES_TOP = 80;
const PAGE_LINES_TOP = 30;
const LINE_HEIGHT = 20;

/**
 * Render paginated report lines as a letter-size PDF, one page per entry of
 * `pages`. The first page opens with the title, the rule and the subtitle.
 */
export function generateReportPdf(pages: readonly string[][], subtitle?: string): Promise<Buffer> {
    const doc = new PDFDocument({
        size: 'LETTER',
        margin: 0,
        autoFirstPage: false,
        info: { Title: PRINT_LAYOUT.TITLE, Creator: 'Churchbooks' },
    });

    const chunks: Buffer[] = [];
    const done = new Promise<Buffer>((resolve, reject) => {
        doc.on('data', (chunk: Buffer) => chunks.push(chunk));
        doc.on('end', () => resolve(Buffer.concat(chunks)));
        doc.on('error', reject);
    });

    pages.forEach((lines, pageIndex) => {
        doc.addPage();
        doc.font('Helvetica').fontSize(12);

        let top = PAGE_LINES_TOP;
        if (pageIndex === 0) {
            doc.text(PRINT_LAYOUT.TITLE, LEFT, TITLE_TOP, { lineBreak: false });
            doc.text(PRINT_LAYOUT.RULE, LEFT, RULE_TOP, { lineBreak: false });
            if (subtitle) {
                doc.text(subtitle, LEFT, SUBTITLE_TOP, { lineBreak: false });
            }
            top = FIRST_PAGE_LINES_TOP;
        }

        for (const line of lines) {
            doc.text(line, LEFT, top, { lineBreak: false });
            top += LINE_HEIGHT;
        }
    });

    doc.end();
    return done;
}
