export enum VpcAz
{
    a = "a",
    b = "b",
    c = "c"
}
