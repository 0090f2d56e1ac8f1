/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import { ProjectsController } from '../api/projects.controller.js';
import { ProjectService, PROJECTS_COLLECTION } from '../services/project.service.js';
import { MarkdownService } from '../../../services/markdown/markdown.service.js';
import { NotFoundError, ValidationError } from '../../../lib/errors.js';
import { createMockDatabaseService, type MockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import { createMockRequest, createMockResponse } from '../../../tests/vitest/mocks/express.js';

describe('ProjectsController', () => {
    let mockDb: MockDatabaseService;
    let service: ProjectService;
    let controller: ProjectsController;

    beforeEach(async () => {
        mockDb = createMockDatabaseService();
        service = new ProjectService(mockDb, createMockLogger());
        await service.ensureIndexes();
        controller = new ProjectsController(service, new MarkdownService());
    });

    describe('public endpoints', () => {
        it('should list featured cards without the body', async () => {
            const featured = await service.createProject({
                title: 'Shown',
                shortDescription: 'Card',
                description: 'Body',
                featured: true
            });
            await service.createProject({ title: 'Hidden', shortDescription: 'Card', description: 'Body' });
            const res = createMockResponse();

            await controller.listPublicProjects(createMockRequest({ query: { featured: 'true' } }), res.res);

            expect(res.body()).toEqual({
                projects: [
                    {
                        id: 1,
                        title: 'Shown',
                        slug: 'shown',
                        short_description: 'Card',
                        tech_stack: [],
                        metrics: '',
                        github_url: null,
                        live_url: null,
                        featured: true,
                        order: 0,
                        created_at: featured.createdAt,
                        updated_at: featured.updatedAt
                    }
                ]
            });
        });

        it('should render the project description', async () => {
            await service.createProject({ title: 'Tool', shortDescription: 'Card', description: '**Bold**' });
            const res = createMockResponse();

            await controller.getPublicProject(createMockRequest({ params: { slug: 'tool' } }), res.res);

            expect(res.body()).toMatchObject({
                slug: 'tool',
                description: '**Bold**',
                html: '<p><strong>Bold</strong></p>'
            });
        });

        it('should answer an unknown slug with 404', async () => {
            await expect(
                controller.getPublicProject(createMockRequest({ params: { slug: 'nope' } }), createMockResponse().res)
            ).rejects.toThrow(NotFoundError);
        });
    });

    describe('admin endpoints', () => {
        it('should create a project from the snake_case body', async () => {
            const req = createMockRequest({
                body: {
                    title: 'New Tool',
                    short_description: 'Card',
                    description: 'Body',
                    tech_stack: 'TypeScript, Node',
                    github_url: '',
                    live_url: 'https://example.com',
                    order: 3
                }
            });
            const res = createMockResponse();

            await controller.createProject(req, res.res);

            expect(res.statusCode()).toBe(201);
            expect(res.body()).toMatchObject({
                id: 1,
                slug: 'new-tool',
                tech_stack: ['TypeScript', 'Node'],
                github_url: null,
                live_url: 'https://example.com',
                order: 3,
                description: 'Body'
            });
        });

        it('should reject a malformed link', async () => {
            const req = createMockRequest({
                body: { title: 'T', short_description: 'S', description: 'D', live_url: 'not a url' }
            });

            await expect(controller.createProject(req, createMockResponse().res)).rejects.toBeInstanceOf(ZodError);
            expect(mockDb.getCollectionData(PROJECTS_COLLECTION)).toHaveLength(0);
        });

        it('should patch a project and answer 404 for an unknown id', async () => {
            await service.createProject({ title: 'Tool', shortDescription: 'Card', description: 'Body' });
            const res = createMockResponse();

            await controller.updateProject(createMockRequest({ params: { id: '1' }, body: { featured: true } }), res.res);

            expect(res.body()).toMatchObject({ id: 1, title: 'Tool', featured: true });
            await expect(
                controller.updateProject(createMockRequest({ params: { id: '2' }, body: {} }), createMockResponse().res)
            ).rejects.toThrow('Project not found');
        });

        it('should reject a non-numeric id', async () => {
            await expect(
                controller.deleteProject(createMockRequest({ params: { id: 'x' } }), createMockResponse().res)
            ).rejects.toBeInstanceOf(ValidationError);
        });
    });
});
