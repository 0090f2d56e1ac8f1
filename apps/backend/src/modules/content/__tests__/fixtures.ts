import { DefaultContentCatalog } from '../../../services/catalog/default-content-catalog.js';

/**
 * Small catalog shared by the content module tests.
 */
export function createTestCatalog(): DefaultContentCatalog {
    return new DefaultContentCatalog({
        sections: {},
        pages: {
            about: {
                title: 'About Me',
                content: '# About\n\nHello there',
                metaDescription: 'About page'
            }
        },
        settings: {
            site_name: { value: 'Default', description: 'Site name' },
            site_tagline: { value: 'T' }
        },
        resume: [
            {
                key: 'header',
                sectionType: 'header',
                title: 'Sam Example',
                content: '{"tagline": "Engineer"}',
                order: 1
            },
            {
                key: 'summary',
                sectionType: 'summary',
                title: 'Summary',
                content: 'Builds things.',
                order: 2
            }
        ]
    });
}
