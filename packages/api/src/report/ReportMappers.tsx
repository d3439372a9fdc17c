/*
 * Copyright (C) 2026 Fluxer Contributors
 *
 * This file is part of Fluxer.
 *
 * Fluxer is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * Fluxer is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 *
 * You should have received a copy of the GNU Affero General Public License
 * along with Fluxer. If not, see <https://www.gnu.org/licenses/>.
 */

import type {Report} from '@platewatch/api/src/models/Report';
import type {ReportResponse} from '@platewatch/schema/src/domains/report/ReportSchemas';

export function mapReportToResponse(report: Report): ReportResponse {
	return {
		id: report.id,
		plate_number: report.plateNumber,
		violations: [...report.violations],
		location: report.location,
		description: report.description,
		photo_url: report.photoUrl,
		user_id: report.userId,
		status: report.status,
		moderation: report.moderation
			? {
					approved: report.moderation.approved,
					reason: report.moderation.reason,
					confidence: report.moderation.confidence,
					flags: [...report.moderation.flags],
					reviewed_at: report.moderation.reviewedAt.toISOString(),
				}
			: null,
		created_at: report.createdAt.toISOString(),
		updated_at: report.updatedAt.toISOString(),
	};
}
