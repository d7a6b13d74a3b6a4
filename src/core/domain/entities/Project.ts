export type FlatType = 'TWO_ROOM' | 'THREE_ROOM';

export const FLAT_TYPES: readonly FlatType[] = ['TWO_ROOM', 'THREE_ROOM'];

// Higher rank = larger flat; eligibility for a rank covers every rank below it
export const FLAT_RANK: Record<FlatType, number> = {
  TWO_ROOM: 2,
  THREE_ROOM: 3,
};

// Calendar day as YYYY-MM-DD, so lexical order is chronological order
export type IsoDate = string;

export interface Project {
  projectID: string;
  name: string;
  neighborhoods: Set<string>;
  units: Map<FlatType, number>;
  price: Map<FlatType, number>;
  openDate: IsoDate;
  closeDate: IsoDate;
  managerID: string;
  officerSlotsRemaining: number;
  assignedOfficerIDs: Set<string>;
  bookedApplicantIDs: Set<string>;
  visible: boolean;
}

// Fields a manager may supply when creating a project
export interface ProjectParams {
  name: string;
  neighborhoods: string[];
  units: Partial<Record<FlatType, number>>;
  price: Partial<Record<FlatType, number>>;
  openDate: IsoDate;
  closeDate: IsoDate;
  officerSlots: number;
  visible?: boolean;
}

// Editable fields; projectID and managerID are deliberately absent
export type ProjectPatch = Partial<
  Pick<ProjectParams, 'name' | 'neighborhoods' | 'units' | 'price' | 'openDate' | 'closeDate' | 'visible'>
> & { officerSlotsRemaining?: number };
