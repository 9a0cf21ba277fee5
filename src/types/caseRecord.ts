export interface CaseStub {
  case_number: string;
  case_id: string | null;
  histopathology_diagnosis: string;
  detail_link: string | null;
}

export interface ImageDescriptor {
  url: string;
  stage: string;
  description: string;
  order: number;
}

export interface CaseRecord extends CaseStub {
  age: string | null;
  hpv_status: string | null;
  provisional_diagnosis: string | null;
  management: string | null;
  swede_score: string | null;
  images: ImageDescriptor[];
}

export const UNKNOWN = "Unknown";

export function recordFromStub(stub: CaseStub): CaseRecord {
  return {
    case_number: stub.case_number,
    case_id: stub.case_id,
    histopathology_diagnosis: stub.histopathology_diagnosis,
    detail_link: stub.detail_link,
    age: null,
    hpv_status: null,
    provisional_diagnosis: null,
    management: null,
    swede_score: null,
    images: []
  };
}
