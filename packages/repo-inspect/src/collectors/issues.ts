/**
 * Issue-tracking collectors - labels and milestones
 */

import type { Label, Milestone } from '../types.js';
import { labelListSchema, milestoneListSchema } from './schemas.js';
import { repositoryPath, type Collector } from './types.js';

export const collectLabels: Collector<'labels'> = async (client, repository) => {
  const response = labelListSchema.parse(await client.get(`${repositoryPath(repository)}/labels?per_page=100`));
  return response.map((label) => {
    const mapped: Label = { name: label.name, color: label.color };
    if (label.description) {
      mapped.description = label.description;
    }
    return mapped;
  });
};

export const collectMilestones: Collector<'milestones'> = async (client, repository) => {
  const response = milestoneListSchema.parse(
    await client.get(`${repositoryPath(repository)}/milestones?state=all&per_page=100`)
  );
  return response.map((milestone) => {
    const mapped: Milestone = { title: milestone.title, state: milestone.state };
    if (milestone.description) {
      mapped.description = milestone.description;
    }
    if (milestone.due_on) {
      mapped.dueOn = milestone.due_on;
    }
    return mapped;
  });
};
