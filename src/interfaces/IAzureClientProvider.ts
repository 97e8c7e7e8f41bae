import { ITestApi } from "azure-devops-node-api/TestApi";
import { ITestPlanApi } from "azure-devops-node-api/TestPlanApi";
import { IWorkItemTrackingApi } from "azure-devops-node-api/WorkItemTrackingApi";
import { AppEnv } from "./IConfigService";

/** The three REST areas test point sync talks to. */
export interface ServiceClients {
    testApi: ITestApi;
    testPlanApi: ITestPlanApi;
    workItemApi: IWorkItemTrackingApi;
}

export type ConnectionSettings = Pick<AppEnv, "token" | "authType" | "orgUrl">;

export interface IAzureClientProvider {
    connect(settings: ConnectionSettings): Promise<ServiceClients>;
}
