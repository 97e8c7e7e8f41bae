import * as azureDevOps from "azure-devops-node-api";
import { IAzureClientProvider, ConnectionSettings, ServiceClients } from "./interfaces/IAzureClientProvider";

export class AzureClientProvider implements IAzureClientProvider {
    async connect({ token, authType, orgUrl }: ConnectionSettings): Promise<ServiceClients> {
        // Pipelines hand out System.AccessToken, which is a bearer token rather than a PAT.
        const authHandler =
            authType === "bearer"
                ? azureDevOps.getBearerHandler(token)
                : azureDevOps.getPersonalAccessTokenHandler(token);
        const connection = new azureDevOps.WebApi(orgUrl, authHandler);

        const [testApi, testPlanApi, workItemApi] = await Promise.all([
            connection.getTestApi(),
            connection.getTestPlanApi(),
            connection.getWorkItemTrackingApi(),
        ]);

        return { testApi, testPlanApi, workItemApi };
    }
}
