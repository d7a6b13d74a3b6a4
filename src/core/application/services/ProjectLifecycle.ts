import type { IdGenerator } from '../../ports';
import type { EntityGraph } from '../../domain/EntityGraph';
import type { FlatType, Project, ProjectParams, ProjectPatch } from '../../domain/entities/Project';
import { FLAT_TYPES } from '../../domain/entities/Project';
import type { Manager } from '../../domain/entities/User';
import type { Outcome } from '../../domain/outcome';
import { fail, succeed } from '../../domain/outcome';
import type { DateWindow } from '../../domain/rules/dates';
import { isIsoDate, windowsOverlap } from '../../domain/rules/dates';

export interface DeletionReport {
  project: Project;
  removedRequestIDs: string[];
  unlinkedApplicantIDs: string[];
  rejectedOfficerIDs: string[];
}

const negativeEntry = (values: Partial<Record<FlatType, number>> | undefined): FlatType | undefined =>
  FLAT_TYPES.find((type) => {
    const value = values?.[type];
    return value !== undefined && (!Number.isInteger(value) || value < 0);
  });

export class ProjectLifecycle {
  constructor(
    private readonly graph: EntityGraph,
    private readonly ids: IdGenerator,
  ) {}

  create(manager: Manager, params: ProjectParams): Outcome<Project> {
    const invalid = this.validate(params);
    if (invalid) {
      return fail('InvalidProject', invalid);
    }

    const projects = [...this.graph.projects.values()];
    const sameName = projects.find((p) => p.name === params.name);
    if (sameName) {
      return fail('DuplicateName', `A project named "${params.name}" already exists (${sameName.projectID})`);
    }

    const clash = projects.find((p) => p.managerID === manager.userID && windowsOverlap(p, params));
    if (clash) {
      return fail('ManagerOverlap', `Manager ${manager.userID} already runs ${clash.projectID} in that window`);
    }

    const project: Project = {
      projectID: this.ids.nextProjectID(),
      name: params.name,
      neighborhoods: new Set(params.neighborhoods),
      units: new Map(FLAT_TYPES.map((type): [FlatType, number] => [type, params.units[type] ?? 0])),
      price: pricesOf(params.price),
      openDate: params.openDate,
      closeDate: params.closeDate,
      managerID: manager.userID,
      officerSlotsRemaining: params.officerSlots,
      assignedOfficerIDs: new Set(),
      bookedApplicantIDs: new Set(),
      visible: params.visible ?? true,
    };

    this.graph.projects.set(project.projectID, project);
    manager.projectIDs.add(project.projectID);
    return succeed(project);
  }

  // Field replacement only; projectID and managerID are fixed for life
  edit(projectID: string, patch: ProjectPatch): Outcome<Project> {
    const project = this.graph.projects.get(projectID);
    if (!project) {
      return fail('ProjectNotFound', `Project ${projectID} not found`);
    }

    const window: DateWindow = {
      openDate: patch.openDate ?? project.openDate,
      closeDate: patch.closeDate ?? project.closeDate,
    };
    const invalid = this.validate({
      name: patch.name ?? project.name,
      units: patch.units,
      price: patch.price,
      officerSlots: patch.officerSlotsRemaining ?? project.officerSlotsRemaining,
      ...window,
    });
    if (invalid) {
      return fail('InvalidProject', invalid);
    }

    const others = [...this.graph.projects.values()].filter((p) => p.projectID !== projectID);
    if (patch.name !== undefined && others.some((p) => p.name === patch.name)) {
      return fail('DuplicateName', `A project named "${patch.name}" already exists`);
    }
    const clash = others.find((p) => p.managerID === project.managerID && windowsOverlap(p, window));
    if (clash) {
      return fail('ManagerOverlap', `Manager ${project.managerID} already runs ${clash.projectID} in that window`);
    }

    if (patch.name !== undefined) project.name = patch.name;
    if (patch.neighborhoods !== undefined) project.neighborhoods = new Set(patch.neighborhoods);
    if (patch.units !== undefined) {
      for (const type of FLAT_TYPES) {
        const count = patch.units[type];
        if (count !== undefined) project.units.set(type, count);
      }
    }
    if (patch.price !== undefined) {
      for (const type of FLAT_TYPES) {
        const price = patch.price[type];
        if (price !== undefined) project.price.set(type, price);
      }
    }
    if (patch.officerSlotsRemaining !== undefined) project.officerSlotsRemaining = patch.officerSlotsRemaining;
    if (patch.visible !== undefined) project.visible = patch.visible;
    project.openDate = window.openDate;
    project.closeDate = window.closeDate;

    return succeed(project);
  }

  toggleVisibility(projectID: string): Outcome<Project> {
    const project = this.graph.projects.get(projectID);
    if (!project) {
      return fail('ProjectNotFound', `Project ${projectID} not found`);
    }
    project.visible = !project.visible;
    return succeed(project);
  }

  /**
   * Removes the project and every live reference to it: the manager's set, all
   * requests, applicants currently linked to it and officers registered on it.
   * Per-project status history on users is kept, set to UNSUCCESSFUL / REJECTED.
   */
  delete(projectID: string): Outcome<DeletionReport> {
    const project = this.graph.projects.get(projectID);
    if (!project) {
      return fail('ProjectNotFound', `Project ${projectID} not found`);
    }

    this.graph.projects.delete(projectID);
    this.graph.managers.get(project.managerID)?.projectIDs.delete(projectID);

    const removedRequestIDs: string[] = [];
    for (const [requestID, request] of this.graph.requests) {
      if (request.projectID === projectID) {
        removedRequestIDs.push(requestID);
      }
    }
    removedRequestIDs.forEach((id) => this.graph.requests.delete(id));

    const unlinkedApplicantIDs: string[] = [];
    for (const applicant of this.graph.applicants.values()) {
      if (applicant.activeProjectID === projectID) {
        applicant.activeProjectID = null;
        applicant.applicationStatusByProject.set(projectID, 'UNSUCCESSFUL');
        unlinkedApplicantIDs.push(applicant.userID);
      }
      applicant.appliedFlatByProject.delete(projectID);
    }

    const rejectedOfficerIDs: string[] = [];
    for (const officer of this.graph.officers.values()) {
      const status = officer.registrationStatusByProject.get(projectID);
      const registered = officer.registeredProjectIDs.delete(projectID);
      if (registered || (status !== undefined && status !== 'REJECTED')) {
        officer.registrationStatusByProject.set(projectID, 'REJECTED');
        rejectedOfficerIDs.push(officer.userID);
      }
    }

    return succeed({ project, removedRequestIDs, unlinkedApplicantIDs, rejectedOfficerIDs });
  }

  private validate(params: {
    name: string;
    openDate: string;
    closeDate: string;
    officerSlots: number;
    units?: Partial<Record<FlatType, number>>;
    price?: Partial<Record<FlatType, number>>;
  }): string | null {
    if (params.name.trim().length === 0) {
      return 'Project name is required';
    }
    if (!isIsoDate(params.openDate) || !isIsoDate(params.closeDate)) {
      return `Dates must be YYYY-MM-DD (got ${params.openDate}, ${params.closeDate})`;
    }
    if (params.closeDate < params.openDate) {
      return `Close date ${params.closeDate} is before open date ${params.openDate}`;
    }
    if (!Number.isInteger(params.officerSlots) || params.officerSlots < 0) {
      return `Officer slots must be a non-negative integer (got ${params.officerSlots})`;
    }
    const badUnits = negativeEntry(params.units);
    if (badUnits) {
      return `Unit count for ${badUnits} must be a non-negative integer`;
    }
    const badPrice = negativeEntry(params.price);
    if (badPrice) {
      return `Price for ${badPrice} must be a non-negative integer`;
    }
    return null;
  }
}

function pricesOf(price: Partial<Record<FlatType, number>>): Map<FlatType, number> {
  const prices = new Map<FlatType, number>();
  for (const type of FLAT_TYPES) {
    const value = price[type];
    if (value !== undefined) {
      prices.set(type, value);
    }
  }
  return prices;
}
