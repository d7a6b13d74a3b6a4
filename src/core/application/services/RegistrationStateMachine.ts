import type { IdGenerator } from '../../ports';
import type { EntityGraph } from '../../domain/EntityGraph';
import type { Project } from '../../domain/entities/Project';
import type { Officer, RegistrationStatus } from '../../domain/entities/User';
import { ACTIVE_REGISTRATION_STATES } from '../../domain/entities/User';
import type { ApprovedStatus, RegistrationRequest } from '../../domain/entities/Request';
import { overallFor } from '../../domain/entities/Request';
import type { Outcome } from '../../domain/outcome';
import { fail, succeed } from '../../domain/outcome';
import { windowsOverlap } from '../../domain/rules/dates';

export interface RegistrationDecision {
  request: RegistrationRequest;
  status: RegistrationStatus;
  assigned: boolean;
  slotsRemaining: number;
}

// PENDING -> APPROVED | APPROVED_UNASSIGNED | REJECTED, with officer-slot accounting
export class RegistrationStateMachine {
  constructor(
    private readonly graph: EntityGraph,
    private readonly ids: IdGenerator,
  ) {}

  register(officer: Officer, project: Project): Outcome<RegistrationRequest> {
    if (!project.visible) {
      return fail('ProjectNotVisible', `Project ${project.projectID} is not open for registration`);
    }

    if (this.isApplicantOn(officer, project)) {
      return fail('ApplicantOnProject', `Officer ${officer.userID} has applied for ${project.projectID}`);
    }

    const existing = officer.registrationStatusByProject.get(project.projectID);
    if (existing && ACTIVE_REGISTRATION_STATES.includes(existing)) {
      return fail('AlreadyRegistered', `Officer ${officer.userID} is already ${existing} for ${project.projectID}`);
    }

    const clash = this.activeWindows(officer).find((other) => windowsOverlap(other, project));
    if (clash) {
      return fail(
        'RegistrationOverlap',
        `Project ${project.projectID} overlaps ${clash.projectID} (${clash.openDate} to ${clash.closeDate})`,
      );
    }

    officer.registrationStatusByProject.set(project.projectID, 'PENDING');

    const request: RegistrationRequest = {
      requestID: this.ids.nextRequestID(),
      type: 'REGISTRATION',
      userID: officer.userID,
      projectID: project.projectID,
      overallStatus: 'PENDING',
      approval: 'PENDING',
    };
    this.graph.requests.set(request.requestID, request);
    return succeed(request);
  }

  decide(request: RegistrationRequest, decision: ApprovedStatus): Outcome<RegistrationDecision> {
    const officer = this.graph.officers.get(request.userID);
    if (!officer) {
      return fail('UserNotFound', `Officer ${request.userID} not found`);
    }
    const project = this.graph.projects.get(request.projectID);
    if (!project) {
      return fail('ProjectNotFound', `Project ${request.projectID} not found`);
    }

    const projectID = project.projectID;
    const latest = this.graph
      .requestsFor(officer.userID, projectID)
      .filter((r): r is RegistrationRequest => r.type === 'REGISTRATION')
      .at(-1);
    if (latest && latest.requestID !== request.requestID) {
      return fail('RequestSuperseded', `Registration ${request.requestID} has been superseded by ${latest.requestID}`);
    }

    // Bringing back a rejected registration must pass the same checks as registering
    const current = officer.registrationStatusByProject.get(projectID);
    const reviving = decision !== 'UNSUCCESSFUL' && !(current && ACTIVE_REGISTRATION_STATES.includes(current));
    if (reviving) {
      if (this.isApplicantOn(officer, project)) {
        return fail('ApplicantOnProject', `Officer ${officer.userID} has applied for ${projectID}`);
      }
      const clash = this.activeWindows(officer).find(
        (other) => other.projectID !== projectID && windowsOverlap(other, project),
      );
      if (clash) {
        return fail(
          'RegistrationOverlap',
          `Project ${projectID} overlaps ${clash.projectID} (${clash.openDate} to ${clash.closeDate})`,
        );
      }
    }

    const assigned = project.assignedOfficerIDs.has(officer.userID);
    let status: RegistrationStatus;

    switch (decision) {
      case 'SUCCESSFUL':
        if (assigned) {
          status = 'APPROVED';
        } else if (project.officerSlotsRemaining > 0) {
          project.assignedOfficerIDs.add(officer.userID);
          project.officerSlotsRemaining -= 1;
          officer.registeredProjectIDs.add(projectID);
          status = 'APPROVED';
        } else {
          status = 'APPROVED_UNASSIGNED';
        }
        break;
      case 'UNSUCCESSFUL':
        if (assigned) {
          project.assignedOfficerIDs.delete(officer.userID);
          project.officerSlotsRemaining += 1;
        }
        officer.registeredProjectIDs.delete(projectID);
        status = 'REJECTED';
        break;
      case 'PENDING':
        status = 'PENDING';
        break;
    }

    officer.registrationStatusByProject.set(projectID, status);
    request.approval = decision;
    request.overallStatus = overallFor(decision);

    return succeed({
      request,
      status,
      assigned: project.assignedOfficerIDs.has(officer.userID),
      slotsRemaining: project.officerSlotsRemaining,
    });
  }

  // Projects whose registration still claims the officer's calendar
  activeWindows(officer: Officer): Project[] {
    const windows: Project[] = [];
    officer.registrationStatusByProject.forEach((status, projectID) => {
      const project = this.graph.projects.get(projectID);
      if (project && ACTIVE_REGISTRATION_STATES.includes(status)) {
        windows.push(project);
      }
    });
    return windows;
  }

  isApplicantOn(officer: Officer, project: Project): boolean {
    const profile = this.graph.applicants.get(officer.applicantID);
    return project.bookedApplicantIDs.has(officer.applicantID) || profile?.activeProjectID === project.projectID;
  }
}
