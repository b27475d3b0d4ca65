import {
    companyNameFromDomain,
    createDegradedSnapshot,
    createSiteSnapshot,
    domainOf,
    getSnapshotContents,
    isSnapshotValid,
} from '../../../src/domain/entities/SiteSnapshot';

function snapshotWithBody(bodyText: string) {
    return createSiteSnapshot('https://acme.example/', {
        title: 'Acme',
        metaDescription: 'Tools',
        metaKeywords: '',
        bodyText,
        links: [],
        images: [],
    }, 200);
}

describe('SiteSnapshot', () => {
    describe('domainOf', () => {
        it('should return the host including port', () => {
            expect(domainOf('https://www.acme.example:8080/about')).toBe('www.acme.example:8080');
        });

        it('should return empty string for unparseable urls', () => {
            expect(domainOf('not a url')).toBe('');
        });
    });

    describe('createSiteSnapshot', () => {
        it('should derive the domain and freeze the snapshot', () => {
            const snapshot = snapshotWithBody('text');

            expect(snapshot.domain).toBe('acme.example');
            expect(snapshot.statusCode).toBe(200);
            expect(snapshot.fetchError).toBeUndefined();
            expect(Object.isFrozen(snapshot)).toBe(true);
            expect(Object.isFrozen(snapshot.links)).toBe(true);
        });
    });

    describe('createDegradedSnapshot', () => {
        it('should name the domain in the title and leave content empty', () => {
            const snapshot = createDegradedSnapshot('https://down.example', 'Error scraping https://down.example: timeout', {
                statusCode: 503,
            });

            expect(snapshot.title).toBe('Error accessing down.example');
            expect(snapshot.bodyText).toBe('');
            expect(snapshot.links).toEqual([]);
            expect(snapshot.images).toEqual([]);
            expect(snapshot.statusCode).toBe(503);
            expect(snapshot.fetchError).toBe('Error scraping https://down.example: timeout');
        });

        it('should use the processing title for unexpected failures', () => {
            const snapshot = createDegradedSnapshot('https://down.example', 'boom', { unexpected: true });
            expect(snapshot.title).toBe('Error processing down.example');
        });
    });

    describe('isSnapshotValid', () => {
        it('should require more than 100 characters of text', () => {
            expect(isSnapshotValid(snapshotWithBody('a'.repeat(100)))).toBe(false);
            expect(isSnapshotValid(snapshotWithBody('a'.repeat(101)))).toBe(true);
        });

        it('should reject degraded snapshots', () => {
            expect(isSnapshotValid(createDegradedSnapshot('https://down.example', 'boom'))).toBe(false);
        });
    });

    describe('getSnapshotContents', () => {
        it('should include title, description and truncated text', () => {
            const contents = getSnapshotContents(snapshotWithBody('x'.repeat(3500)));

            expect(contents).toBe(
                `Webpage Title: Acme\n\nMeta Description: Tools\n\nWebpage Contents:\n${'x'.repeat(3000)}...\n\n`
            );
        });

        it('should describe the error for degraded snapshots', () => {
            const contents = getSnapshotContents(createDegradedSnapshot('https://down.example', 'boom'));

            expect(contents).toBe(
                'Webpage Title: Error accessing down.example\n\n'
                + 'Error: boom\n\n'
                + 'Note: Limited information available due to scraping restrictions.\n'
                + 'Company appears to be: down.example\n\n'
            );
        });
    });

    describe('companyNameFromDomain', () => {
        it('should drop www and the suffix and title-case the label', () => {
            expect(companyNameFromDomain('www.acme-tools.com')).toBe('Acme-Tools');
            expect(companyNameFromDomain('shop.example.org')).toBe('Shop');
            expect(companyNameFromDomain('www.EXAMPLE.com')).toBe('Example');
            expect(companyNameFromDomain('acme2go.io')).toBe('Acme2Go');
        });
    });
});
