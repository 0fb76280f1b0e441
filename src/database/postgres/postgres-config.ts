import * as aws from "@pulumi/aws";
import * as Pulumi from "@pulumi/pulumi";


export interface PostgresConfig
{
    subnetIds: ReadonlyArray<Pulumi.Output<string>>;
    securityGroupIds: ReadonlyArray<Pulumi.Output<string>>;
    databaseName: string;
    instanceClass: string;
    username: Pulumi.Input<string>;
    /** generated when not provided */
    password?: Pulumi.Input<string>;
    provider?: aws.Provider;
}
