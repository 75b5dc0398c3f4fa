import * as path from 'path';
import { env, PROJECT_FILES } from './config.js';

export interface ProjectPaths {
  name: string;
  root: string;
  script: string;
  actors: string;
  finalMovie: string;
}

/** Resolve a project name (or a path to a project directory) to its files. */
export function resolveProject(project: string, projectsDir: string = env.PROJECTS_DIR): ProjectPaths {
  const root = path.resolve(projectsDir, project);
  return {
    name:       path.basename(root),
    root,
    script:     path.join(root, PROJECT_FILES.script),
    actors:     env.ACTORS_FILE ? path.resolve(env.ACTORS_FILE) : path.join(root, PROJECT_FILES.actors),
    finalMovie: path.join(root, PROJECT_FILES.finalMovie),
  };
}
