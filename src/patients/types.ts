export interface PatientContext {
    hospitalId: string;
    bedNumber: string;
    name?: string;
    age?: number;
    primaryDiagnosis?: string;
    medications: string[];
    allergies: string[];
    restrictions: string[];
    assignedNurseId?: string;
    assignedPhysicianId?: string;
    languagePreference?: string;
}

/** Read-only patient lookup. A missing patient resolves to null. */
export interface PatientContextProvider {
    lookup(hospitalId: string): Promise<PatientContext | null>;
}
