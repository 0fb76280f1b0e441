import * as Pulumi from "@pulumi/pulumi";


export interface S3bucketDetails
{
    bucketId: Pulumi.Output<string>;
    bucketName: Pulumi.Output<string>;
    bucketArn: Pulumi.Output<string>;
    websiteEndpoint: Pulumi.Output<string> | null;
}
