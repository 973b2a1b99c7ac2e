import { type OrganizationDirectory } from '@gatehouse/domain';
import { queryable } from '../rows';

export class PgOrganizationDirectory implements OrganizationDirectory {
  async isMember(tx: unknown, organizationId: string, userId: string): Promise<boolean> {
    const result = await queryable(tx).query(
      `SELECT 1 FROM organization_members WHERE organization_id = $1 AND user_id = $2`,
      [organizationId, userId],
    );
    return result.rows.length > 0;
  }
}
