export const mdlConstants = {
	//"IDPO" read as a little endian int
	ident: 0x4f504449,
	version: 6,
	framenamelength: 16,
	//sanity bound on group sizes, the format itself has no limit
	maxgroupframes: 10000
} as const;

export const triConstants = {
	magic: 123322,//0x0001e1ba
	floatstart: 99999.0,
	floatend: -99999.0,
	//floats per triangle corner: normal xyz, pos xyz, color rgb, uv
	cornerfloats: 11,
	maxtriangles: 200000,
	defaultobjectname: "exported_object",
	defaulttexturename: "default_skin"
} as const;

export const lbmConstants = {
	formtype: "PBM ",
	bmhdsize: 20,
	palettesize: 768,
	nplanes: 8,
	masking: { none: 0, mask: 1, transcolor: 2, lasso: 3 },
	compression: { none: 0, rle1: 1 },
	xaspect: 5,
	yaspect: 6
} as const;
