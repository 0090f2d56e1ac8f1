import type { IProject } from '@portfolio/types';

/**
 * Card shape for listings: everything but the markdown body.
 */
export function serializeProjectSummary(project: IProject) {
    return {
        id: project.id,
        title: project.title,
        slug: project.slug,
        short_description: project.shortDescription,
        tech_stack: project.techStack,
        metrics: project.metrics,
        github_url: project.githubUrl,
        live_url: project.liveUrl,
        featured: project.featured,
        order: project.order,
        created_at: project.createdAt,
        updated_at: project.updatedAt
    };
}

export function serializeProject(project: IProject) {
    return {
        ...serializeProjectSummary(project),
        description: project.description
    };
}
