import * as Pulumi from "@pulumi/pulumi";


export interface PostgresDetails
{
    /** host:port */
    endpoint: Pulumi.Output<string>;
    address: Pulumi.Output<string>;
    port: Pulumi.Output<number>;
    databaseName: Pulumi.Output<string>;
    username: Pulumi.Output<string>;
    password: Pulumi.Output<string>;
}
