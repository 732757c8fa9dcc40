import type { CareTeam, EscalationLevel } from '../triage/types.js';
import type { PatientContext } from './types.js';

export interface StaffingDefaults {
    defaultNurseId: string;
    defaultPhysicianId: string;
    emergencyTeamId: string;
}

export function resolveCareTeam(patient: PatientContext | null, staffing: StaffingDefaults): CareTeam {
    return {
        nurseId: patient?.assignedNurseId ?? staffing.defaultNurseId,
        physicianId: patient?.assignedPhysicianId ?? staffing.defaultPhysicianId,
        emergencyTeamId: staffing.emergencyTeamId,
    };
}

/** Staff to notify for a decision, most immediate first. */
export function recipientsFor(escalation: EscalationLevel, team: CareTeam): string[] {
    switch (escalation) {
        case 'EMERGENCY':
            return [team.emergencyTeamId, team.nurseId, team.physicianId];
        case 'DOCTOR':
            return [team.nurseId, team.physicianId];
        case 'NURSE':
        case 'NONE':
            return [team.nurseId];
    }
}

/** Who takes over when an approval assigned to `assignedTo` misses its SLA. */
export function nextTier(assignedTo: string, team: CareTeam): string {
    return assignedTo === team.physicianId ? team.emergencyTeamId : team.physicianId;
}
