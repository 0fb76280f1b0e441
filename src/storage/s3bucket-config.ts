import * as aws from "@pulumi/aws";


export interface S3bucketConfig
{
    bucketName: string;
    /**
     * All or nothing: a public bucket serves every object to anonymous GET
     * through its website endpoint, a private one serves nothing.
     */
    isPublic: boolean;
    /** default: index.html */
    indexDocument?: string;
    errorDocument?: string;
    /** default: false */
    forceDestroy?: boolean;
    provider?: aws.Provider;
}
