import type { IdGenerator } from '../../ports';
import type { EntityGraph } from '../../domain/EntityGraph';
import type { UserRole } from '../../domain/entities/User';
import type { EnquiryRequest } from '../../domain/entities/Request';
import type { Outcome } from '../../domain/outcome';
import { fail, succeed } from '../../domain/outcome';

export interface Responder {
  userID: string;
  role: UserRole;
}

export class EnquiryService {
  constructor(
    private readonly graph: EntityGraph,
    private readonly ids: IdGenerator,
  ) {}

  submit(userID: string, projectID: string, query: string): Outcome<EnquiryRequest> {
    const project = this.graph.projects.get(projectID);
    if (!project || !project.visible) {
      return fail('ProjectNotFound', `Project ${projectID} not found or not visible`);
    }
    const text = query.trim();
    if (!text) {
      return fail('EmptyEnquiry', 'Enquiry text is empty');
    }

    const enquiry: EnquiryRequest = {
      requestID: this.ids.nextRequestID(),
      type: 'ENQUIRY',
      userID,
      projectID,
      overallStatus: 'PENDING',
      query: text,
      answer: null,
      answeredBy: null,
    };
    this.graph.requests.set(enquiry.requestID, enquiry);
    return succeed(enquiry);
  }

  edit(userID: string, requestID: string, query: string): Outcome<EnquiryRequest> {
    const found = this.ownOpenEnquiry(userID, requestID);
    if (!found.ok) {
      return found;
    }
    const text = query.trim();
    if (!text) {
      return fail('EmptyEnquiry', 'Enquiry text is empty');
    }
    found.value.query = text;
    return found;
  }

  delete(userID: string, requestID: string): Outcome<EnquiryRequest> {
    const found = this.ownOpenEnquiry(userID, requestID);
    if (found.ok) {
      this.graph.requests.delete(requestID);
    }
    return found;
  }

  answer(responder: Responder, requestID: string, answer: string): Outcome<EnquiryRequest> {
    const found = this.enquiry(requestID);
    if (!found.ok) {
      return found;
    }
    const enquiry = found.value;
    if (!this.canAnswer(responder, enquiry.projectID)) {
      return fail('Forbidden', `${responder.userID} does not handle enquiries for ${enquiry.projectID}`);
    }
    const text = answer.trim();
    if (!text) {
      return fail('EmptyEnquiry', 'Answer text is empty');
    }

    enquiry.answer = text;
    enquiry.answeredBy = responder.userID;
    enquiry.overallStatus = 'DONE';
    return succeed(enquiry);
  }

  listByUser(userID: string): EnquiryRequest[] {
    return this.all().filter((e) => e.userID === userID);
  }

  listForProjects(projectIDs: ReadonlySet<string>): EnquiryRequest[] {
    return this.all().filter((e) => projectIDs.has(e.projectID));
  }

  all(): EnquiryRequest[] {
    return [...this.graph.requests.values()].filter((r): r is EnquiryRequest => r.type === 'ENQUIRY');
  }

  private canAnswer(responder: Responder, projectID: string): boolean {
    if (responder.role === 'MANAGER') {
      return this.graph.managers.get(responder.userID)?.projectIDs.has(projectID) ?? false;
    }
    if (responder.role === 'OFFICER') {
      return this.graph.officers.get(responder.userID)?.registeredProjectIDs.has(projectID) ?? false;
    }
    return false;
  }

  private enquiry(requestID: string): Outcome<EnquiryRequest> {
    const request = this.graph.requests.get(requestID);
    if (!request) {
      return fail('RequestNotFound', `Request ${requestID} not found`);
    }
    if (request.type !== 'ENQUIRY') {
      return fail('WrongRequestType', `Request ${requestID} is a ${request.type}, not an enquiry`);
    }
    return succeed(request);
  }

  private ownOpenEnquiry(userID: string, requestID: string): Outcome<EnquiryRequest> {
    const found = this.enquiry(requestID);
    if (!found.ok) {
      return found;
    }
    if (found.value.userID !== userID) {
      return fail('NotOwner', `Enquiry ${requestID} belongs to another user`);
    }
    if (found.value.overallStatus !== 'PENDING') {
      return fail('EnquiryClosed', `Enquiry ${requestID} has already been answered`);
    }
    return found;
  }
}
