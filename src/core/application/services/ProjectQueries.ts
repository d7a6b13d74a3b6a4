import type { EligibilityRules } from '../../ports';
import type { EntityGraph } from '../../domain/EntityGraph';
import type { FlatType, IsoDate, Project } from '../../domain/entities/Project';
import type { Applicant, ApplicationStatus, Manager, Officer } from '../../domain/entities/User';
import { DEFAULT_ELIGIBILITY, eligibility } from '../../domain/rules/eligibility';
import { windowsOverlap } from '../../domain/rules/dates';
import type { FilterCriteria, FilterSortEngine } from './FilterSortEngine';
import type { RegistrationStateMachine } from './RegistrationStateMachine';

export interface ApplicableProject {
  project: Project;
  maxFlatType: FlatType;
}

// Read-only views over the graph, always passed through the filter engine
export class ProjectQueries {
  constructor(
    private readonly graph: EntityGraph,
    private readonly filter: FilterSortEngine,
    private readonly registrations: RegistrationStateMachine,
    private readonly rules: EligibilityRules = DEFAULT_ELIGIBILITY,
  ) {}

  all(criteria?: FilterCriteria): Project[] {
    return this.filter.apply(this.graph.list('projects'), criteria);
  }

  applicableProjects(applicant: Applicant, today: IsoDate, criteria?: FilterCriteria): ApplicableProject[] {
    const officerIDs = this.graph.officerIDsFor(applicant.userID);
    return this.all(criteria).flatMap((project) => {
      const maxFlatType = eligibility(applicant, project, today, this.rules, officerIDs);
      return maxFlatType ? [{ project, maxFlatType }] : [];
    });
  }

  registrableProjects(officer: Officer, criteria?: FilterCriteria): Project[] {
    const windows = this.registrations.activeWindows(officer);
    return this.all(criteria).filter(
      (project) =>
        project.visible &&
        !this.registrations.isApplicantOn(officer, project) &&
        !windows.some((held) => windowsOverlap(held, project)),
    );
  }

  managedProjects(manager: Manager, criteria?: FilterCriteria): Project[] {
    return this.byIDs(manager.projectIDs, criteria);
  }

  registeredProjects(officer: Officer, criteria?: FilterCriteria): Project[] {
    return this.byIDs(officer.registeredProjectIDs, criteria);
  }

  applicantsOnProject(projectID: string, status?: ApplicationStatus): Applicant[] {
    return this.graph
      .list('applicants')
      .filter(
        (a) =>
          a.activeProjectID === projectID &&
          (status === undefined || a.applicationStatusByProject.get(projectID) === status),
      );
  }

  private byIDs(ids: ReadonlySet<string>, criteria?: FilterCriteria): Project[] {
    const projects: Project[] = [];
    ids.forEach((id) => {
      const project = this.graph.projects.get(id);
      if (project) projects.push(project);
    });
    return this.filter.apply(projects, criteria);
  }
}
