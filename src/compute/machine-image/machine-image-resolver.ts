import { given } from "@nivinjoseph/n-defensive";
import * as aws from "@pulumi/aws";
import { StackConfig } from "../../stack-config.js";
import type { MachineImageQuery } from "./machine-image-query.js";


export class MachineImageResolver
{
    private readonly _namePattern: string;
    private readonly _owner: string;
    private readonly _provider: aws.Provider | undefined;


    public constructor(query: MachineImageQuery = {})
    {
        given(query, "query").ensureHasValue().ensureIsObject()
            .ensureHasStructure({
                "namePattern?": "string",
                "owner?": "string",
                "provider?": "object"
            })
            .ensure(t => t.namePattern == null || t.namePattern.trim().length > 0, "namePattern cannot be blank")
            .ensure(t => t.owner == null || t.owner.trim().length > 0, "owner cannot be blank");

        this._namePattern = query.namePattern?.trim() ?? "amzn2-ami-hvm-*-x86_64-gp2";
        this._owner = query.owner?.trim() ?? "amazon";
        this._provider = query.provider;
    }


    /**
     * @returns the id of the most recently published image matching the query
     * @throws when nothing matches; there is no fallback image
     */
    public async resolveLatest(region: string): Promise<string>
    {
        given(region, "region").ensureHasValue().ensureIsString();

        try
        {
            const ami = await aws.ec2.getAmi({
                mostRecent: true,
                owners: [this._owner],
                filters: [
                    { name: "name", values: [this._namePattern] },
                    { name: "owner-alias", values: [this._owner] }
                ]
            }, { provider: this._provider });

            if (ami.id == null || ami.id.trim().length === 0)
                throw new Error(`No machine image matches ${this._namePattern} published by ${this._owner}`);

            StackConfig.logger.logInfo(`Retrieved AMI ID: ${ami.id} for region ${region}`);

            return ami.id;
        }
        catch (e)
        {
            StackConfig.logger.logError(`Failed to retrieve AMI ID for region ${region}`, e);
            throw e;
        }
    }
}
